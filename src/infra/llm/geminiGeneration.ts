import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ConversationMessage,
  GenerationPort,
  GenerationRequest,
  GenerationResponse,
  JsonSchema,
  ToolCall,
} from "../../core/ports/outboundPorts";
import { HttpJsonClient, toBoundaryErrorCode } from "../http/httpJsonClient";

type GeminiSchema = {
  type: "OBJECT" | "ARRAY" | "STRING" | "NUMBER" | "INTEGER" | "BOOLEAN";
  description?: string;
  properties?: Record<string, GeminiSchema>;
  required?: string[];
  items?: GeminiSchema;
};

type GeminiPart =
  | { text: string }
  | {
      functionCall: { name: string; args: Record<string, unknown> };
      thoughtSignature?: string;
    }
  | {
      functionResponse: { name: string; response: { result: string } };
    };

type GeminiContent = {
  role: "user" | "model";
  parts: GeminiPart[];
};

const geminiResponseSchema = z.object({
  candidates: z
    .array(
      z.object({
        content: z
          .object({
            parts: z
              .array(
                z.object({
                  text: z.string().optional(),
                  thought: z.boolean().optional(),
                  thoughtSignature: z.string().optional(),
                  functionCall: z
                    .object({
                      name: z.string(),
                      args: z.record(z.unknown()).optional(),
                    })
                    .optional(),
                }),
              )
              .optional(),
          })
          .optional(),
        finishReason: z.string().optional(),
      }),
    )
    .optional(),
  promptFeedback: z
    .object({ blockReason: z.string().optional() })
    .optional(),
});

const SCALAR_TYPES = {
  string: "STRING",
  number: "NUMBER",
  integer: "INTEGER",
  boolean: "BOOLEAN",
} as const;

const toGeminiSchema = (schema: JsonSchema): GeminiSchema => {
  switch (schema.type) {
    case "object":
      return {
        type: "OBJECT",
        description: schema.description,
        properties: Object.fromEntries(
          Object.entries(schema.properties).map(([key, value]) => [
            key,
            toGeminiSchema(value),
          ]),
        ),
        required: schema.required,
      };
    case "array":
      return {
        type: "ARRAY",
        description: schema.description,
        items: toGeminiSchema(schema.items),
      };
    default:
      return {
        type: SCALAR_TYPES[schema.type],
        description: schema.description,
      };
  }
};

const toGeminiContent = (message: ConversationMessage): GeminiContent => {
  if (message.role === "user") {
    return { role: "user", parts: [{ text: message.text }] };
  }

  if (message.role === "tool") {
    return {
      role: "user",
      parts: message.results.map((result) => ({
        functionResponse: {
          name: result.name,
          response: { result: result.output },
        },
      })),
    };
  }

  const parts: GeminiPart[] = message.text ? [{ text: message.text }] : [];
  for (const call of message.toolCalls) {
    parts.push(
      call.signature
        ? {
            functionCall: { name: call.name, args: call.args },
            thoughtSignature: call.signature,
          }
        : { functionCall: { name: call.name, args: call.args } },
    );
  }

  return { role: "model", parts };
};

/**
 * Encapsulates Gemini generateContent access so stages stay portable across LLM providers.
 */
export class GeminiGeneration implements GenerationPort {
  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly model: string,
    private readonly timeoutMs = 0,
    private readonly httpClient = new HttpJsonClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error("GEMINI_API_KEY is required for the Gemini provider.");
    }
  }

  async generate(
    request: GenerationRequest,
  ): Promise<Result<GenerationResponse, AppBoundaryError>> {
    const response = await this.httpClient.requestJson<unknown>({
      url: new URL(
        `/v1beta/models/${encodeURIComponent(this.model)}:generateContent`,
        this.baseUrl,
      ).toString(),
      method: "POST",
      headers: { "x-goog-api-key": this.apiKey },
      body: this.buildBody(request),
      timeoutMs: this.timeoutMs,
    });

    if (response.isErr()) {
      return err({
        source: "llm",
        code: toBoundaryErrorCode(response.error),
        provider: "gemini",
        message: response.error.message,
        retryable: response.error.retryable,
        httpStatus: response.error.httpStatus,
        cause: response.error.cause,
      });
    }

    const parsed = geminiResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(
        this.malformed(
          "Gemini response did not match the expected shape.",
          parsed.error.issues,
        ),
      );
    }

    const candidate = parsed.data.candidates?.at(0);
    if (!candidate) {
      const blockReason = parsed.data.promptFeedback?.blockReason;
      return err(
        this.malformed(
          blockReason
            ? `Gemini returned no candidates (prompt blocked: ${blockReason}).`
            : "Gemini returned no candidates.",
        ),
      );
    }

    const parts = candidate.content?.parts ?? [];
    const text = parts
      .filter((part) => !part.thought && typeof part.text === "string")
      .map((part) => part.text)
      .join("");
    const toolCalls = parts.flatMap((part): ToolCall[] =>
      part.functionCall
        ? [
            {
              name: part.functionCall.name,
              args: part.functionCall.args ?? {},
              signature: part.thoughtSignature,
            },
          ]
        : [],
    );

    return ok({ text, toolCalls });
  }

  private buildBody(request: GenerationRequest) {
    const { config } = request;
    const tools = config.tools ?? [];

    return {
      systemInstruction: { parts: [{ text: config.systemInstruction }] },
      contents: request.messages.map(toGeminiContent),
      generationConfig: {
        temperature: config.temperature,
        ...(config.responseSchema
          ? {
              responseMimeType: "application/json",
              responseSchema: toGeminiSchema(config.responseSchema),
            }
          : {}),
      },
      ...(tools.length > 0
        ? {
            tools: [
              {
                functionDeclarations: tools.map((tool) => ({
                  name: tool.name,
                  description: tool.description,
                  parameters: toGeminiSchema(tool.parameters),
                })),
              },
            ],
            toolConfig: {
              functionCallingConfig: {
                mode: config.toolChoice === "none" ? "NONE" : "AUTO",
              },
            },
          }
        : {}),
    };
  }

  private malformed(message: string, cause?: unknown): AppBoundaryError {
    return {
      source: "llm",
      code: "malformed_response",
      provider: "gemini",
      message,
      retryable: false,
      cause,
    };
  }
}
