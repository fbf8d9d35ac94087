import { ConversationLog } from "./conversation";
import { WorkflowEngine, type WorkflowEngineOptions } from "./engine";
import { EmptyCaseTextError, InvalidSessionStateError } from "./errors";
import type { ConversationTurn, Stage, StageEvent, StageResult } from "./types";

export type ApprovalState = "awaiting_input" | "awaiting_approval";

export type PendingApproval = {
  stage: Stage;
  text: string;
  createdAt: number;
};

export type ApprovalStatus = {
  state: ApprovalState;
  /** Stage the human is acting on: the pending stage, or the next one to run. */
  stage: Stage;
  nextStage: Stage;
  pendingText: string | null;
  ready?: boolean;
  isTerminal: boolean;
};

export type ApprovalSessionOptions = WorkflowEngineOptions & {
  onEvent?: (event: StageEvent) => void;
};

const STATE_LABELS: Record<ApprovalState, string> = {
  awaiting_input: "awaiting input",
  awaiting_approval: "awaiting approval"
};

/**
 * Human approval gate over a {@link WorkflowEngine}. Every generated stage output
 * becomes a pending approval that must be approved or refined before the next
 * submission is accepted.
 */
export class ApprovalSession {
  private engine: WorkflowEngine;
  private readonly log = new ConversationLog();
  private pending: PendingApproval | undefined;

  constructor(private readonly options: ApprovalSessionOptions) {
    this.engine = new WorkflowEngine(options);
  }

  get state(): ApprovalState {
    return this.pending ? "awaiting_approval" : "awaiting_input";
  }

  get workflow(): WorkflowEngine {
    return this.engine;
  }

  get pendingApproval(): PendingApproval | undefined {
    return this.pending;
  }

  conversation(): readonly ConversationTurn[] {
    return this.log.entries();
  }

  async startCase(caseText: string): Promise<ApprovalStatus> {
    this.requireState("awaiting_input", "start a case");
    if (this.engine.currentStage !== "initial") {
      throw new InvalidSessionStateError("start a case", `case already at ${this.engine.currentStage}`);
    }
    const text = caseText.trim();
    if (!text) {
      throw new EmptyCaseTextError();
    }

    await this.engine.advance(text);
    let extraction: StageResult;
    try {
      extraction = await this.engine.advance(undefined, { onEvent: this.options.onEvent });
    } catch (error) {
      // Drop the recorded case so startCase can be retried from scratch.
      this.engine.reset();
      throw error;
    }

    this.log.append("user", text);
    this.log.append("assistant", extraction.text);
    this.hold(extraction);
    return this.status();
  }

  async submit(text: string): Promise<ApprovalStatus> {
    this.requireState("awaiting_input", "submit");
    if (this.engine.currentStage === "initial") {
      return this.startCase(text);
    }
    if (this.engine.isTerminal) {
      return this.status();
    }

    // A blank submission runs the stage on the recorded context alone.
    const message = text.trim();
    const userTurns: ConversationTurn[] = message ? [{ role: "user", text: message }] : [];
    const result = await this.engine.advance(message || undefined, {
      conversation: this.log.withPending(...userTurns),
      onEvent: this.options.onEvent
    });

    for (const turn of userTurns) {
      this.log.append(turn.role, turn.text);
    }
    this.log.append("assistant", result.text);
    this.hold(result);
    return this.status();
  }

  approve(): ApprovalStatus {
    this.requireState("awaiting_approval", "approve");
    this.pending = undefined;
    return this.status();
  }

  async refine(text: string): Promise<ApprovalStatus> {
    const pending = this.requirePending("refine");

    const message = text.trim();
    const userTurns: ConversationTurn[] = message ? [{ role: "user", text: message }] : [];
    const result = await this.engine.rerun(pending.stage, message || undefined, {
      conversation: this.log.withPending(...userTurns),
      onEvent: this.options.onEvent
    });

    for (const turn of userTurns) {
      this.log.append(turn.role, turn.text);
    }
    this.log.append("assistant", result.text);
    this.hold(result);
    return this.status();
  }

  clear(): ApprovalStatus {
    this.requireIdle("clear");
    this.engine = new WorkflowEngine(this.options);
    this.log.clear();
    this.pending = undefined;
    return this.status();
  }

  status(): ApprovalStatus {
    const pendingResult = this.pending ? this.engine.getResult(this.pending.stage) : undefined;
    return {
      state: this.state,
      stage: this.pending?.stage ?? this.engine.currentStage,
      nextStage: this.engine.currentStage,
      pendingText: this.pending?.text ?? null,
      ready: pendingResult?.ready,
      isTerminal: this.engine.isTerminal && !this.pending
    };
  }

  private requireIdle(operation: string) {
    if (this.engine.busy) {
      throw new InvalidSessionStateError(operation, "a stage is running");
    }
  }

  private hold(result: StageResult) {
    this.pending = { stage: result.stage, text: result.text, createdAt: Date.now() };
  }

  private requireState(expected: ApprovalState, operation: string) {
    this.requireIdle(operation);
    if (this.state !== expected) {
      throw new InvalidSessionStateError(operation, STATE_LABELS[this.state]);
    }
  }

  private requirePending(operation: string): PendingApproval {
    this.requireIdle(operation);
    if (!this.pending) {
      throw new InvalidSessionStateError(operation, STATE_LABELS[this.state]);
    }
    return this.pending;
  }
}
