import { assertStage, successor } from "./catalog";
import { EmptyCaseTextError, InvalidSessionStateError } from "./errors";
import type { GenerationGateway } from "./gateway";
import { createStageGraph, type StageGraph } from "./graph";
import { silentLogger } from "../libs/logger";
import type { OrchestratorLogger, Stage, StageResult, StageRunOptions } from "./types";

export const DEFAULT_GENERATION_TIMEOUT_MS = 60_000;

export type StageExecutorOptions = {
  gateway: GenerationGateway;
  timeoutMs?: number;
  logger?: OrchestratorLogger;
};

export type StageExecutionInput = StageRunOptions & {
  stage: string;
  results: ReadonlyMap<Stage, StageResult>;
  humanText?: string;
};

export class StageExecutor {
  private readonly graph: StageGraph;
  private readonly logger: OrchestratorLogger;

  constructor(options: StageExecutorOptions) {
    this.graph = createStageGraph({
      gateway: options.gateway,
      timeoutMs: options.timeoutMs ?? DEFAULT_GENERATION_TIMEOUT_MS
    });
    this.logger = options.logger ?? silentLogger;
  }

  async execute(input: StageExecutionInput): Promise<StageResult> {
    const stage = assertStage(input.stage);

    if (stage === "initial") {
      return this.recordCase(input.humanText);
    }
    if (stage === "complete") {
      throw new InvalidSessionStateError("execute a stage", "the case is complete");
    }

    const conversation = input.conversation ?? [];
    const startedAt = Date.now();
    input.onEvent?.({
      event: "stage.started",
      data: { stage, mode: conversation.length > 0 ? "history" : "prompt" }
    });

    const output = await this.graph.invoke({
      stage,
      humanText: input.humanText,
      results: input.results,
      conversation
    });

    if (output.failure) {
      this.logger.warn({ stage, code: output.failure.code, err: output.failure }, "stage failed");
      throw output.failure;
    }

    const result: StageResult = {
      stage,
      text: output.text,
      nextStage: output.nextStage,
      recordedAt: Date.now()
    };
    if (stage === "validation") {
      result.ready = output.ready === true;
    }

    this.logger.info(
      { stage, nextStage: result.nextStage, ready: result.ready, durationMs: Date.now() - startedAt },
      "stage completed"
    );
    if (result.nextStage === stage) {
      input.onEvent?.({ event: "stage.retry", data: { stage } });
    }
    input.onEvent?.({
      event: "stage.completed",
      data: { stage, nextStage: result.nextStage, ready: result.ready }
    });
    return result;
  }

  private recordCase(caseText?: string): StageResult {
    const text = caseText?.trim();
    if (!text) {
      throw new EmptyCaseTextError();
    }
    return {
      stage: "initial",
      text,
      nextStage: successor("initial"),
      recordedAt: Date.now()
    };
  }
}
