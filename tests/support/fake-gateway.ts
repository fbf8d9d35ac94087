import type { GenerateOptions, GenerationGateway } from "../../src/orchestrator/gateway";
import { READINESS_MARKER } from "../../src/orchestrator/readiness";
import type { ConversationTurn } from "../../src/orchestrator/types";

export type GatewayCall = {
  mode: "prompt" | "history";
  payload: string;
  turns: ConversationTurn[];
};

type Reply = string | Error | ((call: GatewayCall) => string | Promise<string>);

/** Scripted generation backend. Unscripted calls answer with a ready marker. */
export class FakeGateway implements GenerationGateway {
  readonly calls: GatewayCall[] = [];
  private readonly replies: Reply[] = [];

  enqueue(...replies: Reply[]): this {
    this.replies.push(...replies);
    return this;
  }

  get lastCall(): GatewayCall | undefined {
    return this.calls[this.calls.length - 1];
  }

  async generateFromPrompt(payload: string, _options?: GenerateOptions): Promise<string> {
    return this.respond({ mode: "prompt", payload, turns: [] });
  }

  async generateFromHistory(
    systemPayload: string,
    turns: readonly ConversationTurn[],
    _options?: GenerateOptions
  ): Promise<string> {
    return this.respond({ mode: "history", payload: systemPayload, turns: [...turns] });
  }

  private async respond(call: GatewayCall): Promise<string> {
    this.calls.push(call);
    const reply = this.replies.shift();
    if (reply === undefined) {
      return `output ${this.calls.length}\n${READINESS_MARKER}`;
    }
    if (reply instanceof Error) {
      throw reply;
    }
    return typeof reply === "function" ? reply(call) : reply;
  }
}

/** Never answers; rejects once the caller aborts. */
export class HangingGateway implements GenerationGateway {
  calls = 0;

  generateFromPrompt(_payload: string, options?: GenerateOptions): Promise<string> {
    return this.wait(options);
  }

  generateFromHistory(
    _systemPayload: string,
    _turns: readonly ConversationTurn[],
    options?: GenerateOptions
  ): Promise<string> {
    return this.wait(options);
  }

  private wait(options?: GenerateOptions): Promise<string> {
    this.calls += 1;
    return new Promise((_resolve, reject) => {
      options?.signal?.addEventListener("abort", () => reject(new Error("aborted")), { once: true });
    });
  }
}

/** Resolves only when `release` is called, for observing in-flight state. */
export function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}
