import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  ConversationMessage,
  GenerationConfig,
  GenerationPort,
  ToolCall,
  ToolDeclaration,
  ToolResult,
} from "../../core/ports/outboundPorts";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";

/**
 * A tool the model may call mid-generation; failures abort the loop instead of being fed back.
 */
export type BoundTool = ToolDeclaration & {
  execute(args: Record<string, unknown>): Promise<Result<string, AppBoundaryError>>;
};

export type ToolLoopOutcome = {
  text: string;
  turns: number;
  toolCallCount: number;
  history: ConversationMessage[];
};

/**
 * Alternates model turns and tool executions until the model answers without requesting tools.
 */
export class ToolLoopRunner {
  constructor(
    private readonly generation: GenerationPort,
    private readonly maxTurns = 8,
    private readonly logger: Logger = defaultLogger,
  ) {
    if (!Number.isInteger(maxTurns) || maxTurns < 1) {
      throw new Error(`maxTurns must be a positive integer, got ${maxTurns}.`);
    }
  }

  /**
   * The final allowed turn disables tool calling so the exchange always ends with text.
   */
  async run(
    config: GenerationConfig,
    input: string,
    tools: BoundTool[],
  ): Promise<Result<ToolLoopOutcome, AppBoundaryError>> {
    const history: ConversationMessage[] = [{ role: "user", text: input }];
    const declarations = tools.map(({ name, description, parameters }) => ({
      name,
      description,
      parameters,
    }));
    let toolCallCount = 0;

    for (let turn = 1; turn <= this.maxTurns; turn += 1) {
      const isLastTurn = turn === this.maxTurns;
      const response = await this.generation.generate({
        config: {
          ...config,
          tools: declarations,
          toolChoice: isLastTurn ? "none" : "auto",
        },
        messages: [...history],
      });

      if (response.isErr()) {
        return err(response.error);
      }

      const { text, toolCalls } = response.value;
      if (toolCalls.length === 0 || isLastTurn) {
        if (toolCalls.length > 0) {
          this.logger.warn(
            { turn, ignoredToolCalls: toolCalls.map((call) => call.name) },
            "Model requested tools after tool calling was disabled",
          );
        }

        history.push({ role: "model", text, toolCalls: [] });
        return ok({ text, turns: turn, toolCallCount, history });
      }

      history.push({ role: "model", text, toolCalls });

      const results: ToolResult[] = [];
      for (const call of toolCalls) {
        const output = await this.execute(call, tools);
        if (output.isErr()) {
          return err(output.error);
        }

        toolCallCount += 1;
        results.push({ name: call.name, output: output.value });
      }

      history.push({ role: "tool", results });
      this.logger.debug(
        { turn, tools: toolCalls.map((call) => call.name) },
        "Tool turn completed",
      );
    }

    // unreachable: the last turn always returns
    throw new Error("Tool loop exited without a final turn.");
  }

  private async execute(
    call: ToolCall,
    tools: BoundTool[],
  ): Promise<Result<string, AppBoundaryError>> {
    const tool = tools.find((candidate) => candidate.name === call.name);
    if (!tool) {
      return ok(`Unknown tool: ${call.name}`);
    }

    return tool.execute(call.args);
  }
}
