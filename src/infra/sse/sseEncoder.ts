import type { PipelineEvent } from "../../core/entities/research";

export const SSE_HEADERS = {
  "Content-Type": "text/event-stream",
  "Cache-Control": "no-cache",
  Connection: "keep-alive",
  "X-Accel-Buffering": "no",
} as const;

export const formatSseFrame = (name: string, data: unknown): string =>
  `event: ${name}\ndata: ${JSON.stringify(data)}\n\n`;

/**
 * Maps a pipeline event onto its wire name and payload; results are flattened to the report fields.
 */
export const encodeSseEvent = (event: PipelineEvent): string => {
  switch (event.type) {
    case "stage":
      return formatSseFrame(
        "stage",
        event.done
          ? { stage: event.stage, message: event.message, done: true }
          : { stage: event.stage, message: event.message },
      );
    case "result":
      return formatSseFrame("result", {
        executive_summary: event.report.executive_summary,
        markdown_report: event.report.markdown_report,
        follow_up_questions: event.report.follow_up_questions,
      });
    case "error":
      return formatSseFrame("error", {
        kind: event.kind,
        stage: event.stage,
        message: event.message,
      });
    case "done":
      return formatSseFrame("done", {});
  }
};
