/**
 * Conversation Memory
 *
 * Per-session history of answered questions. Up to `maxTurns` turns are
 * kept for the session endpoint; only the last `window` go into prompts.
 */

export interface ConversationTurn {
  query: string;
  response: string;
  /** ISO 8601 */
  timestamp: string;
}

export class ConversationMemory {
  private readonly history: ConversationTurn[] = [];

  /**
   * @param window - Turns rendered into the prompt (memory.window)
   * @param maxTurns - Turns retained before the oldest are dropped (memory.max_turns)
   */
  constructor(
    private readonly window: number = 5,
    private readonly maxTurns: number = 100
  ) {
    if (!Number.isInteger(window) || window < 0) {
      throw new Error(`Memory window must be a non-negative integer, got ${window}`);
    }
    if (!Number.isInteger(maxTurns) || maxTurns < 1) {
      throw new Error(`Memory turn limit must be a positive integer, got ${maxTurns}`);
    }
  }

  add(turn: ConversationTurn): void {
    this.history.push(turn);
    if (this.history.length > this.maxTurns) {
      this.history.splice(0, this.history.length - this.maxTurns);
    }
  }

  /** Every turn, oldest first */
  get turns(): readonly ConversationTurn[] {
    return [...this.history];
  }

  get length(): number {
    return this.history.length;
  }

  clear(): void {
    this.history.length = 0;
  }

  /**
   * Render the last `window` turns as a transcript.
   *
   * @example
   * ```typescript
   * memory.add({ query: 'Hi', response: 'Hello! How can I help?', timestamp });
   * memory.render(); // 'Customer: Hi\nAgent: Hello! How can I help?'
   * ```
   */
  render(): string {
    if (this.window === 0) return '';
    return this.history
      .slice(-this.window)
      .map((turn) => `Customer: ${turn.query}\nAgent: ${turn.response}`)
      .join('\n');
  }
}
