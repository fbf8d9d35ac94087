import type { BaseLogger } from "pino";

export const STAGES = [
  "initial",
  "extraction",
  "causal_analysis",
  "validation",
  "counterfactual",
  "diagnosis",
  "treatment_planning",
  "patient_specific",
  "final_plan",
  "visualization",
  "complete"
] as const;

export type Stage = (typeof STAGES)[number];

export type StageStatus = "not_started" | "completed";

export type StageResult = {
  stage: Stage;
  text: string;
  nextStage: Stage;
  /** Only set on validation results. */
  ready?: boolean;
  recordedAt: number;
};

export type ResultsStore = Map<Stage, StageResult>;

export type ConversationRole = "user" | "assistant";

export type ConversationTurn = {
  role: ConversationRole;
  text: string;
};

export type StageEvent =
  | { event: "stage.started"; data: { stage: Stage; mode: GenerationMode } }
  | { event: "stage.completed"; data: { stage: Stage; nextStage: Stage; ready?: boolean } }
  | { event: "stage.retry"; data: { stage: Stage } };

export type GenerationMode = "prompt" | "history";

export type OrchestratorLogger = Pick<BaseLogger, "debug" | "info" | "warn" | "error">;

export type StageRunOptions = {
  /** Prior turns; when non-empty the stage runs in history mode. */
  conversation?: readonly ConversationTurn[];
  onEvent?: (event: StageEvent) => void;
};
