import { err, ok, type Result } from "neverthrow";
import type { ZodType } from "zod";
import type {
  AppBoundaryError,
  PipelineFailure,
} from "../../core/entities/appError";
import type { StageName } from "../../core/entities/research";

/**
 * One pipeline step: structured input in, one generation exchange, textual or structured output out.
 */
export interface PipelineStageHandler<I, O> {
  readonly name: StageName;
  run(input: I): Promise<Result<O, PipelineFailure>>;
}

/**
 * Every boundary failure (transport, status, malformed envelope) is an unavailable upstream for the pipeline.
 */
export const upstreamUnavailable = (
  stage: StageName,
  error: AppBoundaryError,
): PipelineFailure => ({
  kind: "UpstreamUnavailable",
  stage,
  message: `${error.provider} ${error.source} call failed (${error.code}): ${error.message}`,
  cause: error,
});

/**
 * Parses generated text as JSON, then validates the declared shape; nothing is coerced or defaulted.
 */
export const parseStructuredOutput = <T>(
  stage: StageName,
  schema: ZodType<T>,
  text: string,
): Result<T, PipelineFailure> => {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    return err({
      kind: "SchemaViolation",
      stage,
      message: `${stage} output was not valid JSON.`,
      cause: error,
    });
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) =>
        issue.path.length > 0
          ? `${issue.path.join(".")}: ${issue.message}`
          : issue.message,
      )
      .join("; ");

    return err({
      kind: "SchemaViolation",
      stage,
      message: `${stage} output failed validation: ${details}`,
      cause: parsed.error.issues,
    });
  }

  return ok(parsed.data);
};
