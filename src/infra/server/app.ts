import cors from "cors";
import express, {
  type NextFunction,
  type Request,
  type Response,
} from "express";
import { z } from "zod";
import type { ResearchPipelinePort } from "../../core/ports/inboundPorts";
import {
  logger as defaultLogger,
  toErrorDetails,
  type Logger,
} from "../../shared/logger/logger";
import { encodeSseEvent, SSE_HEADERS } from "../sse/sseEncoder";

const researchRequestSchema = z.object({
  query: z
    .string()
    .refine((value) => value.trim().length > 0, "query must not be blank"),
});

export type AppDependencies = {
  pipeline: ResearchPipelinePort;
  corsOrigin: string | string[];
  logger?: Logger;
};

const isMalformedJsonError = (error: unknown): boolean =>
  typeof error === "object" &&
  error !== null &&
  "type" in error &&
  error.type === "entity.parse.failed";

/**
 * Streams one pipeline run as server-sent events; the response always ends when the run terminates.
 */
const streamResearch = async (
  pipeline: ResearchPipelinePort,
  query: string,
  res: Response,
): Promise<void> => {
  const disconnect = new AbortController();
  res.on("close", () => disconnect.abort());

  res.writeHead(200, SSE_HEADERS);
  res.flushHeaders();

  try {
    for await (const event of pipeline.stream(query, disconnect.signal)) {
      res.write(encodeSseEvent(event));
    }
  } finally {
    if (!res.writableEnded) {
      res.end();
    }
  }
};

export const createApp = ({
  pipeline,
  corsOrigin,
  logger = defaultLogger,
}: AppDependencies) => {
  const app = express();

  app.use(cors({ origin: corsOrigin }));
  app.use(express.json());
  app.use((req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    res.on("finish", () => {
      logger.info(
        {
          method: req.method,
          path: req.path,
          status: res.statusCode,
          durationMs: Date.now() - startedAt,
        },
        "HTTP request",
      );
    });
    next();
  });

  app.get("/health", (_req: Request, res: Response) => {
    res.json({ status: "ok" });
  });

  app.post("/research", (req: Request, res: Response, next: NextFunction) => {
    const parsed = researchRequestSchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({
        error: "Invalid request body",
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
        })),
      });
      return;
    }

    streamResearch(pipeline, parsed.data.query, res).catch(next);
  });

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Not found" });
  });

  app.use(
    (error: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        logger.error(
          { error: toErrorDetails(error) },
          "Stream failed after headers were sent",
        );
        next(error);
        return;
      }

      if (isMalformedJsonError(error)) {
        res.status(400).json({ error: "Malformed JSON body" });
        return;
      }

      logger.error({ error: toErrorDetails(error) }, "Unhandled request error");
      res.status(500).json({ error: "Internal server error" });
    },
  );

  return app;
};
