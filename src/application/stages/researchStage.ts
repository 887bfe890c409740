import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { PipelineFailure } from "../../core/entities/appError";
import type { ResearchSummary } from "../../core/entities/research";
import type {
  GenerationConfig,
  WebSearchHit,
  WebSearchPort,
} from "../../core/ports/outboundPorts";
import type { BoundTool, ToolLoopRunner } from "../services/toolLoopRunner";
import { upstreamUnavailable, type PipelineStageHandler } from "./stage";

export const NO_RESULTS_SENTINEL = "No results found.";

export const RESEARCHER_CONFIG: GenerationConfig = {
  systemInstruction: [
    "You are a thorough research assistant.",
    "When given a query, you MUST use the web_search tool to gather real sources from the web before summarizing.",
    "Make multiple searches if needed to cover different angles.",
    "Return a comprehensive research summary that includes key facts, data points, and source URLs.",
  ].join(" "),
  temperature: 0.4,
};

const searchArgsSchema = z.object({
  query: z.string().trim().min(1),
});

export const formatSearchHits = (hits: WebSearchHit[]): string =>
  hits.length === 0
    ? NO_RESULTS_SENTINEL
    : hits
        .map(
          (hit) =>
            `Title: ${hit.title}\nURL: ${hit.url}\nContent: ${hit.content}\n`,
        )
        .join("\n---\n");

/**
 * Binds the web-search port as the model's only tool; zero hits is a valid answer, not a failure.
 */
export const createWebSearchTool = (
  search: WebSearchPort,
  maxResults = 5,
): BoundTool => ({
  name: "web_search",
  description:
    "Search the web and return relevant results with title, source URL and a content excerpt.",
  parameters: {
    type: "object",
    properties: {
      query: {
        type: "string",
        description: "The search query to send to the web search engine",
      },
    },
    required: ["query"],
  },
  execute: async (args) => {
    const parsed = searchArgsSchema.safeParse(args);
    if (!parsed.success) {
      const reason = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "args"}: ${issue.message}`)
        .join("; ");
      return ok(`Invalid arguments for web_search: ${reason}`);
    }

    const hits = await search.search({ query: parsed.data.query, maxResults });
    return hits.map(formatSearchHits);
  },
});

export class ResearchStage
  implements PipelineStageHandler<string, ResearchSummary>
{
  readonly name = "research";

  constructor(
    private readonly toolLoop: ToolLoopRunner,
    private readonly searchTool: BoundTool,
  ) {}

  /**
   * Runs a fresh multi-turn exchange per query and returns the synthesized text verbatim.
   */
  async run(query: string): Promise<Result<ResearchSummary, PipelineFailure>> {
    const outcome = await this.toolLoop.run(RESEARCHER_CONFIG, query, [
      this.searchTool,
    ]);

    if (outcome.isErr()) {
      return err(upstreamUnavailable(this.name, outcome.error));
    }

    if (!outcome.value.text.trim()) {
      return err({
        kind: "EmptyUpstreamResult",
        stage: this.name,
        message: "Research returned no text.",
      });
    }

    return ok(outcome.value.text);
  }
}
