import type {
  PipelineEvent,
  PipelineOutcome,
} from "../entities/research";

export interface ResearchPipelinePort {
  /**
   * Starts one pipeline run and yields its events in emission order; iteration ends when the run terminates.
   */
  stream(query: string, signal?: AbortSignal): AsyncIterable<PipelineEvent>;
  run(
    query: string,
    onEvent?: (event: PipelineEvent) => void,
  ): Promise<PipelineOutcome>;
}
