import { ConversationTurn, TurnRole } from '../types';

/**
 * Caller-owned session memory. One handle per user session; every run reads
 * a snapshot of it and, on success, appends the question and the answer.
 */
export class Conversation {
  private readonly entries: ConversationTurn[];

  constructor(turns: readonly ConversationTurn[] = []) {
    this.entries = turns.map(turn => ({ ...turn }));
  }

  get turns(): readonly ConversationTurn[] {
    return this.entries;
  }

  get length(): number {
    return this.entries.length;
  }

  append(role: TurnRole, text: string): void {
    this.entries.push({ role, text });
  }

  snapshot(): ConversationTurn[] {
    return this.entries.map(turn => ({ ...turn }));
  }
}
