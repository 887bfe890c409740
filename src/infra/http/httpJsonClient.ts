import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryErrorCode } from "../../core/entities/appError";

export type HttpJsonRequest = {
  url: string;
  method: "GET" | "POST";
  headers?: Record<string, string>;
  body?: unknown;
  /** Omit or pass 0 to wait indefinitely. */
  timeoutMs?: number;
  retries?: number;
  retryDelayMs?: number;
};

export type HttpClientError = {
  code: "timeout" | "transport_error" | "non_success_status" | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

const ERROR_BODY_EXCERPT_LENGTH = 300;

/**
 * Centralizes HTTP JSON IO so adapters share one timeout/status parsing policy.
 */
export class HttpJsonClient {
  /**
   * Executes a JSON request; retries happen only when a caller opts in and the failure is retryable.
   */
  async requestJson<T>(
    request: HttpJsonRequest,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = (request.retries ?? 0) + 1;
    let last: Result<T, HttpClientError> = err({
      code: "transport_error",
      message: "HTTP request was never attempted.",
      retryable: false,
    });

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      last = await this.performRequest<T>(request);
      if (last.isOk() || !last.error.retryable || attempt === maxAttempts) {
        return last;
      }

      await this.delay((request.retryDelayMs ?? 0) * attempt);
    }

    return last;
  }

  private async performRequest<T>(
    request: HttpJsonRequest,
  ): Promise<Result<T, HttpClientError>> {
    const controller = new AbortController();
    const timeout =
      request.timeoutMs && request.timeoutMs > 0
        ? setTimeout(() => controller.abort(), request.timeoutMs)
        : undefined;

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: {
          "content-type": "application/json",
          ...request.headers,
        },
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;
        const excerpt = await this.readExcerpt(response);

        return err({
          code: "non_success_status",
          message: excerpt
            ? `HTTP request failed with status ${response.status}: ${excerpt}`
            : `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      try {
        return ok((await response.json()) as T);
      } catch (jsonError) {
        return err({
          code: "invalid_json",
          message: "HTTP response body was not valid JSON.",
          retryable: false,
          cause: jsonError,
        });
      }
    } catch (error) {
      const isTimeoutError =
        error instanceof DOMException && error.name === "AbortError";

      if (isTimeoutError) {
        return err({
          code: "timeout",
          message: `HTTP request timed out after ${request.timeoutMs}ms.`,
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
    }
  }

  private async readExcerpt(response: Response): Promise<string> {
    try {
      const text = (await response.text()).trim();
      return text.slice(0, ERROR_BODY_EXCERPT_LENGTH);
    } catch {
      return "";
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}

/**
 * Maps transport failures onto boundary codes so every adapter classifies status codes the same way.
 */
export const toBoundaryErrorCode = (
  error: HttpClientError,
): AppBoundaryErrorCode => {
  if (error.httpStatus === 429) {
    return "rate_limited";
  }

  if (error.httpStatus === 401 || error.httpStatus === 403) {
    return "auth_invalid";
  }

  if (error.code === "timeout") {
    return "timeout";
  }

  if (error.code === "invalid_json") {
    return "invalid_json";
  }

  if (error.code === "transport_error") {
    return "transport_error";
  }

  return "provider_error";
};
