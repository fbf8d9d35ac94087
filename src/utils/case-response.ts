import type { StageResult } from "../orchestrator/types";
import type { CaseStatus } from "../services/case-sessions";

export type StatusResponse = {
  session_id: string;
  mode: CaseStatus["mode"];
  state: CaseStatus["state"];
  stage: CaseStatus["stage"];
  next_stage: CaseStatus["nextStage"];
  pending_text: string | null;
  ready: boolean | null;
  is_terminal: boolean;
  latest_stage: CaseStatus["latestStage"];
  latest_text: string | null;
  stages: CaseStatus["stages"];
};

export type ResultResponse = {
  stage: StageResult["stage"];
  text: string;
  next_stage: StageResult["nextStage"];
  ready: boolean | null;
  recorded_at: string;
};

export function toStatusResponse(status: CaseStatus): StatusResponse {
  return {
    session_id: status.sessionId,
    mode: status.mode,
    state: status.state,
    stage: status.stage,
    next_stage: status.nextStage,
    pending_text: status.pendingText,
    ready: status.ready ?? null,
    is_terminal: status.isTerminal,
    latest_stage: status.latestStage,
    latest_text: status.latestText,
    stages: status.stages
  };
}

export function toResultResponse(result: StageResult): ResultResponse {
  return {
    stage: result.stage,
    text: result.text,
    next_stage: result.nextStage,
    ready: result.ready ?? null,
    recorded_at: new Date(result.recordedAt).toISOString()
  };
}
