import { GenerationUnavailableError, isWorkflowError } from "./errors";
import type { ConversationTurn } from "./types";

export type GenerateOptions = {
  signal?: AbortSignal;
};

/**
 * Seam to the text-generation backend. Implementations raise
 * {@link GenerationUnavailableError} for transport, auth, rate-limit and timeout
 * failures and must not touch orchestrator state.
 */
export interface GenerationGateway {
  generateFromPrompt(payload: string, options?: GenerateOptions): Promise<string>;
  generateFromHistory(
    systemPayload: string,
    turns: readonly ConversationTurn[],
    options?: GenerateOptions
  ): Promise<string>;
}

export function toGenerationUnavailable(error: unknown): GenerationUnavailableError {
  if (error instanceof GenerationUnavailableError) {
    return error;
  }
  if (isWorkflowError(error)) {
    return new GenerationUnavailableError(error.message, { cause: error });
  }
  const detail = error instanceof Error ? error.message : String(error);
  return new GenerationUnavailableError(`Generation failed: ${detail}`, { cause: error });
}

export async function withTimeout<T>(timeoutMs: number, run: (signal: AbortSignal) => Promise<T>): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(new GenerationUnavailableError(`Generation timed out after ${timeoutMs}ms`));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([run(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
