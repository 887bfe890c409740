import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  WebSearchHit,
  WebSearchPort,
  WebSearchRequest,
} from "../../core/ports/outboundPorts";
import {
  HttpJsonClient,
  toBoundaryErrorCode,
  type HttpClientError,
} from "../http/httpJsonClient";

const tavilyResponseSchema = z.object({
  results: z
    .array(
      z.object({
        title: z.string(),
        url: z.string(),
        content: z.string(),
      }),
    )
    .optional(),
});

/**
 * Translates Tavily search payloads into the app's web-search contract.
 */
export class TavilySearchProvider implements WebSearchPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error("TAVILY_API_KEY is required for the Tavily provider.");
    }
  }

  /**
   * Any non-2xx answer is a hard failure; an absent result list means zero hits.
   */
  async search(
    request: WebSearchRequest,
  ): Promise<Result<WebSearchHit[], AppBoundaryError>> {
    const response = await this.httpClient.requestJson<unknown>({
      url: new URL("/search", this.baseUrl).toString(),
      method: "POST",
      body: {
        api_key: this.apiKey,
        query: request.query,
        max_results: request.maxResults,
      },
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err(this.mapHttpError(response.error));
    }

    const parsed = tavilyResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err({
        source: "search",
        code: "malformed_response",
        provider: "tavily",
        message: "Tavily search response did not match the expected shape.",
        retryable: false,
        cause: parsed.error.issues,
      });
    }

    return ok(
      (parsed.data.results ?? []).map((item) => ({
        title: item.title,
        url: item.url,
        content: item.content,
      })),
    );
  }

  private mapHttpError(error: HttpClientError): AppBoundaryError {
    return {
      source: "search",
      code: toBoundaryErrorCode(error),
      provider: "tavily",
      message: error.message,
      retryable: error.retryable,
      httpStatus: error.httpStatus,
      cause: error.cause,
    };
  }
}
