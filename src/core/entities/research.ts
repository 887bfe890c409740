import type { PipelineFailure, PipelineFailureKind } from "./appError";

export type ResearchSummary = string;

export type AnalysisResult = {
  trends: string[];
  risks: string[];
  insights: string[];
};

export type FinalReport = {
  executive_summary: string;
  markdown_report: string;
  follow_up_questions: string[];
};

/**
 * Progress labels as they appear on the wire, distinct from internal stage names.
 */
export type ProgressStage = "researching" | "analysing" | "writing";

export type StageName = PipelineFailure["stage"];

export type PipelineState =
  | "START"
  | "RESEARCHING"
  | "RESEARCHED"
  | "ANALYSING"
  | "ANALYSED"
  | "WRITING"
  | "WRITTEN"
  | "DONE"
  | "FAILED";

export type StageProgressEvent = {
  type: "stage";
  stage: ProgressStage;
  message: string;
  done?: true;
};

export type ResultEvent = {
  type: "result";
  report: FinalReport;
};

export type ErrorEvent = {
  type: "error";
  kind: PipelineFailureKind;
  stage: StageName;
  message: string;
};

export type DoneEvent = {
  type: "done";
};

export type PipelineEvent =
  | StageProgressEvent
  | ResultEvent
  | ErrorEvent
  | DoneEvent;

export type PipelineOutcome =
  | { status: "done"; report: FinalReport }
  | { status: "failed"; failure: PipelineFailure }
  | { status: "abandoned"; state: PipelineState };
