import { randomUUID } from "node:crypto";
import { ApprovalSession, type ApprovalStatus } from "../orchestrator/approval";
import { InvalidSessionStateError } from "../orchestrator/errors";
import type { GenerationGateway } from "../orchestrator/gateway";
import type { OrchestratorLogger, Stage, StageResult, StageStatus } from "../orchestrator/types";
import { STAGES } from "../orchestrator/catalog";
import { silentLogger } from "../libs/logger";

export type SessionMode = "approval" | "proceed";

export type CaseStatus = ApprovalStatus & {
  sessionId: string;
  mode: SessionMode;
  latestStage: Stage | null;
  latestText: string | null;
  stages: Array<{ stage: Stage; status: StageStatus }>;
};

export type CaseSessionOptions = {
  sessionId?: string;
  mode?: SessionMode;
  gateway: GenerationGateway;
  timeoutMs?: number;
  logger?: OrchestratorLogger;
};

/**
 * One patient case. In `approval` mode every stage output waits for the human;
 * in `proceed` mode `advance` moves straight through the catalog.
 */
export class CaseSession {
  readonly sessionId: string;
  readonly mode: SessionMode;
  private readonly approval: ApprovalSession;
  private readonly logger: OrchestratorLogger;
  private touchedAt = Date.now();

  constructor(options: CaseSessionOptions) {
    this.sessionId = options.sessionId ?? randomUUID();
    this.mode = options.mode ?? "approval";
    this.logger = options.logger ?? silentLogger;
    this.approval = new ApprovalSession({
      gateway: options.gateway,
      timeoutMs: options.timeoutMs,
      logger: this.logger,
      sessionId: this.sessionId,
      onEvent: (event) => this.logger.debug({ sessionId: this.sessionId, ...event }, event.event)
    });
  }

  get lastActivity(): number {
    return this.touchedAt;
  }

  touch(now = Date.now()): void {
    this.touchedAt = now;
  }

  get busy(): boolean {
    return this.approval.workflow.busy;
  }

  async startCase(caseText: string): Promise<CaseStatus> {
    if (this.mode === "proceed") {
      await this.proceedFromStart(caseText);
      return this.status();
    }
    await this.approval.startCase(caseText);
    return this.status();
  }

  async submit(text: string): Promise<CaseStatus> {
    this.requireMode("approval", "submit");
    await this.approval.submit(text);
    return this.status();
  }

  approve(): CaseStatus {
    this.requireMode("approval", "approve");
    this.approval.approve();
    return this.status();
  }

  async refine(text: string): Promise<CaseStatus> {
    this.requireMode("approval", "refine");
    await this.approval.refine(text);
    return this.status();
  }

  /** The "Proceed" button: runs the current stage without an approval gate. */
  async advance(text?: string): Promise<StageResult> {
    this.requireMode("proceed", "advance");
    return this.approval.workflow.advance(text);
  }

  restart(): CaseStatus {
    this.approval.clear();
    this.logger.info({ sessionId: this.sessionId }, "case restarted");
    return this.status();
  }

  getResult(stage: string): StageResult | undefined {
    return this.approval.workflow.getResult(stage);
  }

  results(): Partial<Record<Stage, string>> {
    return this.approval.workflow.snapshot();
  }

  records(): ReadonlyMap<Stage, StageResult> {
    return this.approval.workflow.results();
  }

  conversationLength(): number {
    return this.approval.conversation().length;
  }

  status(): CaseStatus {
    const engine = this.approval.workflow;
    const latestStage = engine.latestStage ?? null;
    return {
      ...this.approval.status(),
      sessionId: this.sessionId,
      mode: this.mode,
      latestStage,
      latestText: latestStage ? (engine.getResult(latestStage)?.text ?? null) : null,
      stages: STAGES.map((stage) => ({ stage, status: engine.status(stage) }))
    };
  }

  private async proceedFromStart(caseText: string) {
    const engine = this.approval.workflow;
    if (engine.currentStage !== "initial") {
      throw new InvalidSessionStateError("start a case", `case already at ${engine.currentStage}`);
    }
    await engine.advance(caseText);
    try {
      await engine.advance();
    } catch (error) {
      engine.reset();
      throw error;
    }
  }

  private requireMode(expected: SessionMode, operation: string) {
    if (this.mode !== expected) {
      throw new InvalidSessionStateError(operation, `in ${this.mode} mode`);
    }
  }
}

export type CaseSessionRegistryOptions = Omit<CaseSessionOptions, "sessionId" | "mode"> & {
  idleTtlMs: number;
  now?: () => number;
  /** Called once per session dropped by idle eviction. */
  onEvict?: (sessionId: string) => void;
};

/** Sessions live only in memory and share nothing with each other. */
export class CaseSessionRegistry {
  private readonly sessions = new Map<string, CaseSession>();
  private readonly now: () => number;

  constructor(private readonly options: CaseSessionRegistryOptions) {
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  create(mode: SessionMode = "approval"): CaseSession {
    this.evictIdle();
    const session = new CaseSession({
      mode,
      gateway: this.options.gateway,
      timeoutMs: this.options.timeoutMs,
      logger: this.options.logger
    });
    session.touch(this.now());
    this.sessions.set(session.sessionId, session);
    return session;
  }

  get(sessionId: string | undefined): CaseSession | undefined {
    if (!sessionId) return undefined;
    this.evictIdle();
    const session = this.sessions.get(sessionId);
    session?.touch(this.now());
    return session;
  }

  drop(sessionId: string): boolean {
    return this.sessions.delete(sessionId);
  }

  evictIdle(): string[] {
    const cutoff = this.now() - this.options.idleTtlMs;
    const evicted: string[] = [];
    for (const [sessionId, session] of this.sessions) {
      if (session.lastActivity < cutoff && !session.busy) {
        this.sessions.delete(sessionId);
        evicted.push(sessionId);
      }
    }
    for (const sessionId of evicted) {
      this.options.onEvict?.(sessionId);
    }
    return evicted;
  }
}
