import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";

export type WebSearchRequest = {
  query: string;
  maxResults: number;
};

export type WebSearchHit = {
  title: string;
  url: string;
  content: string;
};

/**
 * Minimal JSON-schema shape shared by structured output and tool parameters.
 */
export type JsonSchema =
  | {
      type: "object";
      description?: string;
      properties: Record<string, JsonSchema>;
      required?: string[];
    }
  | { type: "array"; description?: string; items: JsonSchema }
  | {
      type: "string" | "number" | "integer" | "boolean";
      description?: string;
    };

export type ToolDeclaration = {
  name: string;
  description: string;
  parameters: JsonSchema;
};

export type ToolCall = {
  name: string;
  args: Record<string, unknown>;
  /** Opaque provider token that must be echoed back with the call. */
  signature?: string;
};

export type ToolResult = {
  name: string;
  output: string;
};

export type ConversationMessage =
  | { role: "user"; text: string }
  | { role: "model"; text: string; toolCalls: ToolCall[] }
  | { role: "tool"; results: ToolResult[] };

export type GenerationConfig = {
  systemInstruction: string;
  temperature: number;
  responseSchema?: JsonSchema;
  tools?: ToolDeclaration[];
  toolChoice?: "auto" | "none";
};

export type GenerationRequest = {
  config: GenerationConfig;
  messages: ConversationMessage[];
};

export type GenerationResponse = {
  text: string;
  toolCalls: ToolCall[];
};

export interface WebSearchPort {
  search(
    request: WebSearchRequest,
  ): Promise<Result<WebSearchHit[], AppBoundaryError>>;
}

export interface GenerationPort {
  generate(
    request: GenerationRequest,
  ): Promise<Result<GenerationResponse, AppBoundaryError>>;
}

export interface IdGeneratorPort {
  next(): string;
}
