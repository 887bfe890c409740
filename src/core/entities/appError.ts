/**
 * Describes canonical error categories used at adapter boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "rate_limited"
  | "auth_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: "search" | "llm";
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

export type PipelineFailureKind =
  | "UpstreamUnavailable"
  | "SchemaViolation"
  | "EmptyUpstreamResult";

/**
 * Terminal failure of one pipeline stage; every kind aborts the request.
 */
export type PipelineFailure = {
  kind: PipelineFailureKind;
  stage: "research" | "analysis" | "report";
  message: string;
  cause?: unknown;
};
