import { Command, InvalidArgumentError } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { FinalReport, PipelineEvent } from "../core/entities/research";
import { encodeSseEvent } from "../infra/sse/sseEncoder";
import { ConfigurationError, loadEnv } from "../shared/config/env";
import { logger } from "../shared/logger/logger";

/**
 * Formats a final report into a compact terminal view for manual inspection.
 */
export const formatReport = (report: FinalReport): string => {
  const lines: string[] = [];

  lines.push("Executive summary:");
  lines.push(report.executive_summary);
  lines.push("");
  lines.push(report.markdown_report);
  lines.push("");
  lines.push("Follow-up questions:");
  if (report.follow_up_questions.length === 0) {
    lines.push("- none");
  } else {
    report.follow_up_questions.forEach((question, index) => {
      lines.push(`${index + 1}. ${question}`);
    });
  }

  return lines.join("\n");
};

const parsePort = (value: string): number => {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port <= 0 || port > 65_535) {
    throw new InvalidArgumentError("Port must be an integer in 1-65535.");
  }
  return port;
};

const logProgress = (event: PipelineEvent): void => {
  if (event.type === "stage") {
    logger.info(
      { stage: event.stage, done: event.done ?? false },
      event.message,
    );
  }
};

/**
 * Defines a single command surface so the server and one-off runs share the same pipeline wiring.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("trends-analyser")
    .description("Research, analyse and report on a query with streamed progress");

  cli
    .command("serve")
    .description("Start the HTTP server exposing POST /research")
    .option("--port <port>", "Port to listen on (defaults to PORT)", parsePort)
    .action((opts: { port?: number }) => {
      const runtime = createRuntime();
      const port = opts.port ?? runtime.env.PORT;
      const host = runtime.env.HOST;

      const server = runtime.app.listen(port, host, () => {
        logger.info({ host, port }, "Server listening");
      });

      const shutdown = (signal: NodeJS.Signals) => {
        logger.info({ signal }, "Shutting down");
        server.close(() => process.exit(0));
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  cli
    .command("run")
    .description("Run one pipeline in the terminal and print its events")
    .requiredOption("--query <query>", "Research question to investigate")
    .option("--prettify", "Render a human-friendly report instead of SSE frames")
    .action(async (opts: { query: string; prettify?: boolean }) => {
      const runtime = createRuntime();
      const outcome = await runtime.pipeline.run(opts.query, (event) => {
        if (opts.prettify) {
          logProgress(event);
        } else {
          process.stdout.write(encodeSseEvent(event));
        }
      });

      if (outcome.status === "done" && opts.prettify) {
        console.log(formatReport(outcome.report));
      }

      if (outcome.status !== "done") {
        process.exitCode = 1;
      }
    });

  cli
    .command("status")
    .description("Report resolved configuration")
    .action(() => {
      try {
        const appEnv = loadEnv();
        logger.info(
          {
            nodeEnv: appEnv.NODE_ENV,
            host: appEnv.HOST,
            port: appEnv.PORT,
            corsOrigins: appEnv.CORS_ORIGINS,
            tavilyBaseUrl: appEnv.TAVILY_BASE_URL,
            tavilyApiKeyConfigured: appEnv.TAVILY_API_KEY.length > 0,
            tavilyTimeoutMs: appEnv.TAVILY_TIMEOUT_MS,
            tavilyMaxResults: appEnv.TAVILY_MAX_RESULTS,
            geminiBaseUrl: appEnv.GEMINI_BASE_URL,
            geminiApiKeyConfigured: appEnv.GEMINI_API_KEY.length > 0,
            geminiModel: appEnv.GEMINI_MODEL,
            geminiTimeoutMs: appEnv.GEMINI_TIMEOUT_MS,
            researchMaxTurns: appEnv.RESEARCH_MAX_TURNS,
          },
          "Runtime status",
        );
      } catch (error) {
        if (!(error instanceof ConfigurationError)) {
          throw error;
        }

        logger.warn({ reason: error.message }, "Configuration incomplete");
        process.exitCode = 1;
      }
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
