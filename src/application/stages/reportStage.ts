import { err, type Result } from "neverthrow";
import { z } from "zod";
import type { PipelineFailure } from "../../core/entities/appError";
import type {
  AnalysisResult,
  FinalReport,
} from "../../core/entities/research";
import type {
  GenerationConfig,
  GenerationPort,
} from "../../core/ports/outboundPorts";
import { logger as defaultLogger, type Logger } from "../../shared/logger/logger";
import {
  parseStructuredOutput,
  upstreamUnavailable,
  type PipelineStageHandler,
} from "./stage";

export const finalReportSchema = z.object({
  executive_summary: z.string(),
  markdown_report: z.string(),
  follow_up_questions: z.array(z.string()),
}) satisfies z.ZodType<FinalReport>;

export const SUGGESTED_FOLLOW_UP_RANGE = { min: 3, max: 5 } as const;

export const WRITER_CONFIG: GenerationConfig = {
  systemInstruction: [
    "You are an expert report writer.",
    "Given an analysis with trends, risks, and insights, produce a polished final report.",
    "The executive_summary should be 2-3 concise paragraphs.",
    "The markdown_report should be a detailed, well-structured document with headings, bullet points, and clear sections.",
    "Include 3-5 follow_up_questions that would deepen the research.",
  ].join(" "),
  temperature: 0.5,
  responseSchema: {
    type: "object",
    properties: {
      executive_summary: {
        type: "string",
        description: "A concise executive summary (2-3 paragraphs)",
      },
      markdown_report: {
        type: "string",
        description:
          "A detailed markdown-formatted report with sections and bullet points",
      },
      follow_up_questions: {
        type: "array",
        description: "3-5 follow-up questions for further research",
        items: { type: "string" },
      },
    },
    required: ["executive_summary", "markdown_report", "follow_up_questions"],
  },
};

const bulletSection = (title: string, items: string[]): string =>
  [`${title}:`, ...items.map((item) => `- ${item}`)].join("\n");

export const buildWriterInput = (analysis: AnalysisResult): string =>
  [
    bulletSection("Trends", analysis.trends),
    bulletSection("Risks", analysis.risks),
    bulletSection("Insights", analysis.insights),
  ].join("\n\n");

export class ReportStage
  implements PipelineStageHandler<AnalysisResult, FinalReport>
{
  readonly name = "report";

  constructor(
    private readonly generation: GenerationPort,
    private readonly logger: Logger = defaultLogger,
  ) {}

  /**
   * Surfaces the report as received; a follow-up count outside the suggested range is only logged.
   */
  async run(
    analysis: AnalysisResult,
  ): Promise<Result<FinalReport, PipelineFailure>> {
    const response = await this.generation.generate({
      config: WRITER_CONFIG,
      messages: [{ role: "user", text: buildWriterInput(analysis) }],
    });

    if (response.isErr()) {
      return err(upstreamUnavailable(this.name, response.error));
    }

    return parseStructuredOutput(
      this.name,
      finalReportSchema,
      response.value.text,
    ).map((report) => {
      const count = report.follow_up_questions.length;
      if (
        count < SUGGESTED_FOLLOW_UP_RANGE.min ||
        count > SUGGESTED_FOLLOW_UP_RANGE.max
      ) {
        this.logger.warn(
          { followUpQuestionCount: count },
          "Report follow-up question count outside suggested range",
        );
      }

      return report;
    });
  }
}
