import type { Stage } from "./types";

export type WorkflowErrorCode =
  | "UNKNOWN_STAGE"
  | "EMPTY_CASE_TEXT"
  | "MISSING_DEPENDENCY"
  | "INVALID_SESSION_STATE"
  | "GENERATION_UNAVAILABLE";

export abstract class WorkflowError extends Error {
  abstract readonly code: WorkflowErrorCode;
  abstract readonly statusCode: number;
  readonly retryable: boolean = false;
}

export class UnknownStageError extends WorkflowError {
  readonly code = "UNKNOWN_STAGE";
  readonly statusCode = 400;

  constructor(public readonly stage: string) {
    super(`Unknown stage: ${stage}`);
    this.name = "UnknownStageError";
  }
}

export class EmptyCaseTextError extends WorkflowError {
  readonly code = "EMPTY_CASE_TEXT";
  readonly statusCode = 400;

  constructor() {
    super("Case text is required to start a case");
    this.name = "EmptyCaseTextError";
  }
}

export class MissingDependencyError extends WorkflowError {
  readonly code = "MISSING_DEPENDENCY";
  readonly statusCode = 409;

  constructor(
    public readonly stage: Stage,
    public readonly dependency: Stage
  ) {
    super(`Stage ${stage} requires a recorded ${dependency} result`);
    this.name = "MissingDependencyError";
  }
}

export class InvalidSessionStateError extends WorkflowError {
  readonly code = "INVALID_SESSION_STATE";
  readonly statusCode = 409;

  constructor(
    public readonly operation: string,
    public readonly state: string
  ) {
    super(`Cannot ${operation} while ${state}`);
    this.name = "InvalidSessionStateError";
  }
}

export class GenerationUnavailableError extends WorkflowError {
  readonly code = "GENERATION_UNAVAILABLE";
  readonly statusCode = 503;
  override readonly retryable = true;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "GenerationUnavailableError";
  }
}

export function isWorkflowError(error: unknown): error is WorkflowError {
  return error instanceof WorkflowError;
}
