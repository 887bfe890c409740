import { err, type Result } from "neverthrow";
import type { PipelineFailure } from "../../core/entities/appError";
import type {
  AnalysisResult,
  FinalReport,
  PipelineEvent,
  PipelineOutcome,
  PipelineState,
  ProgressStage,
  ResearchSummary,
  StageName,
} from "../../core/entities/research";
import type { ResearchPipelinePort } from "../../core/ports/inboundPorts";
import type { IdGeneratorPort } from "../../core/ports/outboundPorts";
import {
  logger as defaultLogger,
  toErrorDetails,
  type Logger,
} from "../../shared/logger/logger";
import type { PipelineStageHandler } from "../stages/stage";
import { EventChannel } from "./eventChannel";

export const PIPELINE_TRANSITIONS: Record<PipelineState, PipelineState[]> = {
  START: ["RESEARCHING", "FAILED"],
  RESEARCHING: ["RESEARCHED", "FAILED"],
  RESEARCHED: ["ANALYSING", "FAILED"],
  ANALYSING: ["ANALYSED", "FAILED"],
  ANALYSED: ["WRITING", "FAILED"],
  WRITING: ["WRITTEN", "FAILED"],
  WRITTEN: ["DONE", "FAILED"],
  DONE: [],
  FAILED: [],
};

const STAGE_PLAN: Record<
  StageName,
  {
    progress: ProgressStage;
    active: PipelineState;
    completed: PipelineState;
    startMessage: string;
    doneMessage: string;
  }
> = {
  research: {
    progress: "researching",
    active: "RESEARCHING",
    completed: "RESEARCHED",
    startMessage: "Searching the web...",
    doneMessage: "Research complete",
  },
  analysis: {
    progress: "analysing",
    active: "ANALYSING",
    completed: "ANALYSED",
    startMessage: "Analysing findings...",
    doneMessage: "Analysis complete",
  },
  report: {
    progress: "writing",
    active: "WRITING",
    completed: "WRITTEN",
    startMessage: "Writing report...",
    doneMessage: "Report ready",
  },
};

type EventSink = {
  emit(event: PipelineEvent): void;
  isDetached(): boolean;
};

/**
 * Per-request state holder; rejects any transition outside the linear stage order.
 */
export class PipelineRun {
  private current: PipelineState = "START";

  constructor(
    readonly sessionId: string,
    private readonly sink: EventSink,
    private readonly logger: Logger,
  ) {}

  get state(): PipelineState {
    return this.current;
  }

  get isDetached(): boolean {
    return this.sink.isDetached();
  }

  enter(next: PipelineState): void {
    if (!PIPELINE_TRANSITIONS[this.current].includes(next)) {
      throw new Error(
        `Illegal pipeline transition ${this.current} -> ${next}.`,
      );
    }

    this.logger.debug(
      { sessionId: this.sessionId, from: this.current, to: next },
      "Pipeline transition",
    );
    this.current = next;
  }

  emit(event: PipelineEvent): void {
    this.sink.emit(event);
  }
}

/**
 * Drives research, analysis and report stages in fixed order and reports progress as events.
 */
export class ResearchPipelineService implements ResearchPipelinePort {
  constructor(
    private readonly research: PipelineStageHandler<string, ResearchSummary>,
    private readonly analysis: PipelineStageHandler<
      ResearchSummary,
      AnalysisResult
    >,
    private readonly report: PipelineStageHandler<AnalysisResult, FinalReport>,
    private readonly ids: IdGeneratorPort,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * Starts the pipeline task immediately; the returned channel yields its events until the run terminates.
   * Aborting the signal detaches the consumer: the stage in flight completes, later stages are skipped.
   */
  stream(query: string, signal?: AbortSignal): AsyncIterable<PipelineEvent> {
    const channel = new EventChannel<PipelineEvent>();
    if (signal?.aborted) {
      channel.detach();
    }
    signal?.addEventListener("abort", () => channel.detach(), { once: true });
    const sink: EventSink = {
      emit: (event) => {
        channel.push(event);
      },
      isDetached: () => channel.isDetached,
    };

    this.execute(query, sink)
      .finally(() => channel.close())
      .catch((error: unknown) => {
        this.logger.error(
          { error: toErrorDetails(error) },
          "Pipeline task crashed",
        );
      });

    return channel;
  }

  async run(
    query: string,
    onEvent: (event: PipelineEvent) => void = () => {},
  ): Promise<PipelineOutcome> {
    return this.execute(query, { emit: onEvent, isDetached: () => false });
  }

  private async execute(
    query: string,
    sink: EventSink,
  ): Promise<PipelineOutcome> {
    const run = new PipelineRun(
      `pipeline-${this.ids.next()}`,
      sink,
      this.logger,
    );
    const startedAt = Date.now();
    this.logger.info(
      { sessionId: run.sessionId, queryLength: query.length },
      "Pipeline started",
    );

    const summary = await this.step(run, this.research, query);
    if (summary.isErr()) {
      return this.fail(run, summary.error);
    }
    if (run.isDetached) {
      return this.abandon(run);
    }

    const analysis = await this.step(run, this.analysis, summary.value);
    if (analysis.isErr()) {
      return this.fail(run, analysis.error);
    }
    if (run.isDetached) {
      return this.abandon(run);
    }

    const report = await this.step(run, this.report, analysis.value);
    if (report.isErr()) {
      return this.fail(run, report.error);
    }

    run.enter("DONE");
    run.emit({ type: "result", report: report.value });
    run.emit({ type: "done" });
    this.logger.info(
      { sessionId: run.sessionId, durationMs: Date.now() - startedAt },
      "Pipeline completed",
    );

    return { status: "done", report: report.value };
  }

  /**
   * Wraps one stage with its progress events; a thrown exception is treated as an unavailable upstream.
   */
  private async step<I, O>(
    run: PipelineRun,
    handler: PipelineStageHandler<I, O>,
    input: I,
  ): Promise<Result<O, PipelineFailure>> {
    const plan = STAGE_PLAN[handler.name];
    run.enter(plan.active);
    run.emit({ type: "stage", stage: plan.progress, message: plan.startMessage });

    let result: Result<O, PipelineFailure>;
    try {
      result = await handler.run(input);
    } catch (error) {
      result = err({
        kind: "UpstreamUnavailable",
        stage: handler.name,
        message:
          error instanceof Error
            ? error.message
            : `${handler.name} stage failed unexpectedly.`,
        cause: error,
      });
    }

    if (result.isOk()) {
      run.enter(plan.completed);
      run.emit({
        type: "stage",
        stage: plan.progress,
        message: plan.doneMessage,
        done: true,
      });
    }

    return result;
  }

  private fail(run: PipelineRun, failure: PipelineFailure): PipelineOutcome {
    const failedIn = run.state;
    run.enter("FAILED");
    run.emit({
      type: "error",
      kind: failure.kind,
      stage: failure.stage,
      message: failure.message,
    });
    this.logger.error(
      {
        sessionId: run.sessionId,
        state: failedIn,
        kind: failure.kind,
        stage: failure.stage,
        message: failure.message,
      },
      "Pipeline failed",
    );

    return { status: "failed", failure };
  }

  private abandon(run: PipelineRun): PipelineOutcome {
    this.logger.warn(
      { sessionId: run.sessionId, state: run.state },
      "Client detached; remaining stages skipped",
    );

    return { status: "abandoned", state: run.state };
  }
}
