import type { ConversationRole, ConversationTurn } from "./types";

export class ConversationLog {
  private readonly turns: ConversationTurn[] = [];

  get length(): number {
    return this.turns.length;
  }

  append(role: ConversationRole, text: string): void {
    this.turns.push({ role, text });
  }

  /** Current turns followed by `pending`, without recording anything. */
  withPending(...pending: ConversationTurn[]): ConversationTurn[] {
    return [...this.turns, ...pending];
  }

  entries(): readonly ConversationTurn[] {
    return [...this.turns];
  }

  clear(): void {
    this.turns.length = 0;
  }
}
