import { describe, expect, it, vi } from "vitest";
import { err, ok } from "neverthrow";
import pino from "pino";
import { PipelineRun, ResearchPipelineService } from "./researchPipelineService";
import { ToolLoopRunner } from "./toolLoopRunner";
import { AnalysisStage } from "../stages/analysisStage";
import { ReportStage } from "../stages/reportStage";
import { createWebSearchTool, ResearchStage } from "../stages/researchStage";
import type { PipelineStageHandler } from "../stages/stage";
import type {
  AnalysisResult,
  FinalReport,
  PipelineEvent,
} from "../../core/entities/research";
import type {
  GenerationPort,
  GenerationRequest,
  GenerationResponse,
  WebSearchHit,
  WebSearchPort,
} from "../../core/ports/outboundPorts";

const silentLogger = () => pino({ level: "silent" });
const ids = { next: () => "abc123" };

const ANALYSIS_JSON =
  '{"trends":["Hybrid work is permanent"],"risks":["Office loan defaults"],"insights":["Convert offices to housing"]}';
const REPORT: FinalReport = {
  executive_summary: "Remote work has cut office demand.",
  markdown_report: "# Remote work and CRE\n\n- Vacancy is rising",
  follow_up_questions: [
    "Which cities recover first?",
    "How do lenders respond?",
    "What conversions pencil out?",
  ],
};

const scriptedGeneration = (responses: GenerationResponse[]) => {
  const requests: GenerationRequest[] = [];
  const generation: GenerationPort = {
    generate: async (request) => {
      requests.push(request);
      const next = responses.at(requests.length - 1);
      if (!next) {
        throw new Error(`unexpected generation call #${requests.length}`);
      }
      return ok(next);
    },
  };
  return { generation, requests };
};

const buildPipeline = (
  generation: GenerationPort,
  search: WebSearchPort,
  logger = silentLogger(),
) =>
  new ResearchPipelineService(
    new ResearchStage(
      new ToolLoopRunner(generation, 8, logger),
      createWebSearchTool(search),
    ),
    new AnalysisStage(generation),
    new ReportStage(generation, logger),
    ids,
    logger,
  );

const fixedStage = <I, O>(
  name: PipelineStageHandler<I, O>["name"],
  output: O,
): PipelineStageHandler<I, O> => ({
  name,
  run: async () => ok(output),
});

const collect = async (events: AsyncIterable<PipelineEvent>) => {
  const seen: PipelineEvent[] = [];
  for await (const event of events) {
    seen.push(event);
  }
  return seen;
};

const PROGRESS_EVENTS: PipelineEvent[] = [
  { type: "stage", stage: "researching", message: "Searching the web..." },
  { type: "stage", stage: "researching", message: "Research complete", done: true },
  { type: "stage", stage: "analysing", message: "Analysing findings..." },
  { type: "stage", stage: "analysing", message: "Analysis complete", done: true },
  { type: "stage", stage: "writing", message: "Writing report..." },
  { type: "stage", stage: "writing", message: "Report ready", done: true },
];

describe("ResearchPipelineService", () => {
  it("runs research, analysis and report end to end", async () => {
    const hits: WebSearchHit[] = [
      {
        title: "Office vacancy hits record",
        url: "https://news.example/vacancy",
        content: "Vacancy rates climbed as firms cut space.",
      },
      {
        title: "Lenders brace for CRE losses",
        url: "https://news.example/lenders",
        content: "Banks are setting aside reserves.",
      },
    ];
    const queries: string[] = [];
    const search: WebSearchPort = {
      search: async (request) => {
        queries.push(request.query);
        return ok(hits);
      },
    };
    const { generation, requests } = scriptedGeneration([
      {
        text: "",
        toolCalls: [
          { name: "web_search", args: { query: "remote work office demand" } },
        ],
      },
      { text: "Remote work reduces office demand...", toolCalls: [] },
      { text: ANALYSIS_JSON, toolCalls: [] },
      { text: JSON.stringify(REPORT), toolCalls: [] },
    ]);

    const events = await collect(
      buildPipeline(generation, search).stream(
        "impact of remote work on commercial real estate",
      ),
    );

    expect(events).toEqual([
      ...PROGRESS_EVENTS,
      { type: "result", report: REPORT },
      { type: "done" },
    ]);
    expect(queries).toEqual(["remote work office demand"]);
    expect(requests[0]?.messages).toEqual([
      { role: "user", text: "impact of remote work on commercial real estate" },
    ]);
    expect(requests[2]?.messages).toEqual([
      {
        role: "user",
        text: "Analyse the following research:\n\nRemote work reduces office demand...",
      },
    ]);
    expect(requests[3]?.messages).toEqual([
      {
        role: "user",
        text: "Trends:\n- Hybrid work is permanent\n\nRisks:\n- Office loan defaults\n\nInsights:\n- Convert offices to housing",
      },
    ]);
  });

  it("proceeds past a search that finds nothing", async () => {
    const { generation, requests } = scriptedGeneration([
      { text: "", toolCalls: [{ name: "web_search", args: { query: "q" } }] },
      { text: "Little is known.", toolCalls: [] },
      { text: ANALYSIS_JSON, toolCalls: [] },
      { text: JSON.stringify(REPORT), toolCalls: [] },
    ]);

    const outcome = await buildPipeline(generation, {
      search: async () => ok([]),
    }).run("obscure topic");

    expect(outcome).toEqual({ status: "done", report: REPORT });
    expect(requests[1]?.messages.at(-1)).toEqual({
      role: "tool",
      results: [{ name: "web_search", output: "No results found." }],
    });
  });

  it("stops after an analysis schema violation without starting the writer", async () => {
    const { generation, requests } = scriptedGeneration([
      { text: "Summary", toolCalls: [] },
      { text: '{"trends":[],"insights":[]}', toolCalls: [] },
    ]);

    const events = await collect(
      buildPipeline(generation, { search: async () => ok([]) }).stream("query"),
    );

    expect(events).toEqual([
      ...PROGRESS_EVENTS.slice(0, 3),
      {
        type: "error",
        kind: "SchemaViolation",
        stage: "analysis",
        message: "analysis output failed validation: risks: Required",
      },
    ]);
    expect(requests).toHaveLength(2);
  });

  it("reports an upstream failure in research as a failed outcome", async () => {
    const generation: GenerationPort = {
      generate: async () =>
        err({
          source: "llm",
          code: "timeout",
          provider: "gemini",
          message: "HTTP request timed out after 1000ms.",
          retryable: true,
        }),
    };
    const seen: PipelineEvent[] = [];

    const outcome = await buildPipeline(generation, {
      search: async () => ok([]),
    }).run("query", (event) => seen.push(event));

    expect(outcome.status).toBe("failed");
    expect(seen).toEqual([
      PROGRESS_EVENTS[0],
      {
        type: "error",
        kind: "UpstreamUnavailable",
        stage: "research",
        message:
          "gemini llm call failed (timeout): HTTP request timed out after 1000ms.",
      },
    ]);
  });

  it("treats a thrown stage exception as an unavailable upstream", async () => {
    const pipeline = new ResearchPipelineService(
      fixedStage("research", "Summary"),
      {
        name: "analysis",
        run: async () => {
          throw new Error("socket hang up");
        },
      },
      fixedStage<AnalysisResult, FinalReport>("report", REPORT),
      ids,
      silentLogger(),
    );

    const outcome = await pipeline.run("query");

    expect(outcome.status).toBe("failed");
    if (outcome.status !== "failed") {
      throw new Error("expected failure");
    }
    expect(outcome.failure.kind).toBe("UpstreamUnavailable");
    expect(outcome.failure.stage).toBe("analysis");
    expect(outcome.failure.message).toBe("socket hang up");
  });

  it("produces identical results for identical upstream replies", async () => {
    const pipeline = new ResearchPipelineService(
      fixedStage("research", "Summary"),
      fixedStage<string, AnalysisResult>("analysis", {
        trends: ["t"],
        risks: ["r"],
        insights: ["i"],
      }),
      fixedStage<AnalysisResult, FinalReport>("report", REPORT),
      ids,
      silentLogger(),
    );

    const first = await collect(pipeline.stream("query"));
    const second = await collect(pipeline.stream("query"));

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it("skips later stages once the client detaches", async () => {
    const logger = silentLogger();
    const warn = vi.spyOn(logger, "warn");
    let releaseResearch: () => void = () => {};
    const researchGate = new Promise<void>((resolve) => {
      releaseResearch = resolve;
    });
    const analysisRun = vi.fn(async () =>
      ok({ trends: [], risks: [], insights: [] }),
    );
    const pipeline = new ResearchPipelineService(
      {
        name: "research",
        run: async () => {
          await researchGate;
          return ok("Summary");
        },
      },
      { name: "analysis", run: analysisRun },
      fixedStage<AnalysisResult, FinalReport>("report", REPORT),
      ids,
      logger,
    );
    const controller = new AbortController();

    const seen: PipelineEvent[] = [];
    for await (const event of pipeline.stream("query", controller.signal)) {
      seen.push(event);
      controller.abort();
    }
    releaseResearch();

    await vi.waitFor(() => {
      expect(warn).toHaveBeenCalledWith(
        { sessionId: "pipeline-abc123", state: "RESEARCHED" },
        "Client detached; remaining stages skipped",
      );
    });
    expect(seen).toEqual([PROGRESS_EVENTS[0]]);
    expect(analysisRun).not.toHaveBeenCalled();
  });
});

describe("PipelineRun", () => {
  it("rejects transitions outside the stage order", () => {
    const run = new PipelineRun(
      "pipeline-1",
      { emit: () => {}, isDetached: () => false },
      silentLogger(),
    );

    run.enter("RESEARCHING");

    expect(() => run.enter("WRITING")).toThrow(
      "Illegal pipeline transition RESEARCHING -> WRITING.",
    );
    expect(run.state).toBe("RESEARCHING");
  });

  it("allows failure from any active state but nothing after a terminal one", () => {
    const run = new PipelineRun(
      "pipeline-2",
      { emit: () => {}, isDetached: () => false },
      silentLogger(),
    );

    run.enter("FAILED");

    expect(() => run.enter("RESEARCHING")).toThrow(
      "Illegal pipeline transition FAILED -> RESEARCHING.",
    );
  });
});
