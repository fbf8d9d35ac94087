import { assertStage, isTerminalStage, STAGES } from "./catalog";
import { InvalidSessionStateError, MissingDependencyError } from "./errors";
import { StageExecutor, type StageExecutorOptions } from "./executor";
import { silentLogger } from "../libs/logger";
import type {
  OrchestratorLogger,
  ResultsStore,
  Stage,
  StageResult,
  StageRunOptions,
  StageStatus
} from "./types";

export type WorkflowEngineOptions = StageExecutorOptions & {
  sessionId?: string;
};

/**
 * Owns the results store and the current stage. `advance` and `rerun` are the
 * only writers; a failed stage leaves both untouched.
 */
export class WorkflowEngine {
  private readonly store: ResultsStore = new Map();
  private readonly executor: StageExecutor;
  private readonly logger: OrchestratorLogger;
  private readonly sessionId?: string;
  private current: Stage = "initial";
  private lastStage: Stage | undefined;
  private inFlight = false;

  constructor(options: WorkflowEngineOptions) {
    this.executor = new StageExecutor(options);
    this.logger = options.logger ?? silentLogger;
    this.sessionId = options.sessionId;
  }

  get currentStage(): Stage {
    return this.current;
  }

  get isTerminal(): boolean {
    return isTerminalStage(this.current);
  }

  get latestStage(): Stage | undefined {
    return this.lastStage;
  }

  get busy(): boolean {
    return this.inFlight;
  }

  async advance(humanText?: string, options: StageRunOptions = {}): Promise<StageResult> {
    if (this.isTerminal) {
      const last = this.lastStage ? this.store.get(this.lastStage) : undefined;
      if (!last) {
        throw new MissingDependencyError("complete", "visualization");
      }
      return last;
    }

    return this.exclusive("advance", () => this.run(this.current, humanText, options));
  }

  /** Re-executes the most recently recorded stage, replacing its entry. */
  async rerun(stage: string, humanText?: string, options: StageRunOptions = {}): Promise<StageResult> {
    const target = assertStage(stage);
    if (target !== this.lastStage) {
      const state = this.lastStage ? `${this.lastStage} is the latest stage` : "no stage has run";
      throw new InvalidSessionStateError(`rerun ${target}`, state);
    }

    return this.exclusive("rerun", () => this.run(target, humanText, options));
  }

  getResult(stage: string): StageResult | undefined {
    return this.store.get(assertStage(stage));
  }

  status(stage: string): StageStatus {
    return this.store.has(assertStage(stage)) ? "completed" : "not_started";
  }

  results(): ReadonlyMap<Stage, StageResult> {
    return this.store;
  }

  /** Stage → text, in catalog order, for report and graph consumers. */
  snapshot(): Partial<Record<Stage, string>> {
    const texts: Partial<Record<Stage, string>> = {};
    for (const stage of STAGES) {
      const result = this.store.get(stage);
      if (result) {
        texts[stage] = result.text;
      }
    }
    return texts;
  }

  reset(): void {
    if (this.inFlight) {
      throw new InvalidSessionStateError("reset", "a stage is running");
    }
    this.store.clear();
    this.current = "initial";
    this.lastStage = undefined;
    this.logger.info({ sessionId: this.sessionId }, "workflow reset");
  }

  private async run(stage: Stage, humanText: string | undefined, options: StageRunOptions) {
    const result = await this.executor.execute({
      stage,
      results: this.store,
      humanText,
      conversation: options.conversation,
      onEvent: options.onEvent
    });

    this.store.set(stage, result);
    this.lastStage = stage;
    this.current = result.nextStage;
    this.logger.debug({ sessionId: this.sessionId, stage, nextStage: result.nextStage }, "stage recorded");
    return result;
  }

  private async exclusive<T>(operation: string, run: () => Promise<T>): Promise<T> {
    if (this.inFlight) {
      throw new InvalidSessionStateError(operation, "another operation is in progress");
    }
    this.inFlight = true;
    try {
      return await run();
    } finally {
      this.inFlight = false;
    }
  }
}
