import { err, type Result } from "neverthrow";
import { z } from "zod";
import type { PipelineFailure } from "../../core/entities/appError";
import type {
  AnalysisResult,
  ResearchSummary,
} from "../../core/entities/research";
import type {
  GenerationConfig,
  GenerationPort,
} from "../../core/ports/outboundPorts";
import {
  parseStructuredOutput,
  upstreamUnavailable,
  type PipelineStageHandler,
} from "./stage";

export const analysisResultSchema = z.object({
  trends: z.array(z.string()),
  risks: z.array(z.string()),
  insights: z.array(z.string()),
}) satisfies z.ZodType<AnalysisResult>;

export const ANALYST_CONFIG: GenerationConfig = {
  systemInstruction: [
    "You are a senior analyst.",
    "Given a research summary, identify the most important trends, potential risks, and actionable insights.",
    "Be specific and back up your analysis with evidence from the research.",
  ].join(" "),
  temperature: 0.3,
  responseSchema: {
    type: "object",
    properties: {
      trends: {
        type: "array",
        description: "Key trends identified from the research",
        items: { type: "string" },
      },
      risks: {
        type: "array",
        description: "Potential risks or challenges",
        items: { type: "string" },
      },
      insights: {
        type: "array",
        description: "Actionable insights and observations",
        items: { type: "string" },
      },
    },
    required: ["trends", "risks", "insights"],
  },
};

export const buildAnalystInput = (summary: ResearchSummary): string =>
  `Analyse the following research:\n\n${summary}`;

export class AnalysisStage
  implements PipelineStageHandler<ResearchSummary, AnalysisResult>
{
  readonly name = "analysis";

  constructor(private readonly generation: GenerationPort) {}

  async run(
    summary: ResearchSummary,
  ): Promise<Result<AnalysisResult, PipelineFailure>> {
    const response = await this.generation.generate({
      config: ANALYST_CONFIG,
      messages: [{ role: "user", text: buildAnalystInput(summary) }],
    });

    if (response.isErr()) {
      return err(upstreamUnavailable(this.name, response.error));
    }

    return parseStructuredOutput(
      this.name,
      analysisResultSchema,
      response.value.text,
    );
  }
}
