import { ResearchPipelineService } from "../services/researchPipelineService";
import { ToolLoopRunner } from "../services/toolLoopRunner";
import { AnalysisStage } from "../stages/analysisStage";
import { ReportStage } from "../stages/reportStage";
import { createWebSearchTool, ResearchStage } from "../stages/researchStage";
import { corsOrigins, loadEnv, type AppEnv } from "../../shared/config/env";
import { logger } from "../../shared/logger/logger";
import { GeminiGeneration } from "../../infra/llm/geminiGeneration";
import { TavilySearchProvider } from "../../infra/search/tavilySearchProvider";
import { createApp } from "../../infra/server/app";
import { ShortHexIdGenerator } from "../../infra/system/systemPorts";

/**
 * Centralizes runtime wiring so the HTTP server and CLI share one composition root.
 * Configuration is validated here, so a missing credential fails before any request is served.
 */
export const createRuntime = (appEnv: AppEnv = loadEnv()) => {
  const search = new TavilySearchProvider(
    appEnv.TAVILY_BASE_URL,
    appEnv.TAVILY_API_KEY,
    appEnv.TAVILY_TIMEOUT_MS,
  );
  const generation = new GeminiGeneration(
    appEnv.GEMINI_BASE_URL,
    appEnv.GEMINI_API_KEY,
    appEnv.GEMINI_MODEL,
    appEnv.GEMINI_TIMEOUT_MS,
  );

  const toolLoop = new ToolLoopRunner(
    generation,
    appEnv.RESEARCH_MAX_TURNS,
    logger,
  );
  const pipeline = new ResearchPipelineService(
    new ResearchStage(
      toolLoop,
      createWebSearchTool(search, appEnv.TAVILY_MAX_RESULTS),
    ),
    new AnalysisStage(generation),
    new ReportStage(generation, logger),
    new ShortHexIdGenerator(),
    logger,
  );

  const app = createApp({
    pipeline,
    corsOrigin: corsOrigins(appEnv),
    logger,
  });

  return { env: appEnv, pipeline, app };
};
