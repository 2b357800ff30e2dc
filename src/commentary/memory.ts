export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
  timestamp: string;
}

/** Normalize for repeat checks: lowercase, trim, strip numbers and punctuation. */
function normalizeLine(line: string): string {
  return line.toLowerCase().trim().replace(/\d+/g, '#').replace(/[^\p{L}#\s]+/gu, '').replace(/\s+/g, ' ');
}

/**
 * Rolling buffer of the last N prompt/reply turns.
 * Fed back to the model as history and used to catch repeated lines.
 */
export class ConversationMemory {
  private _turns: ConversationTurn[] = [];
  private _maxSize: number;

  constructor(maxSize = 12) {
    this._maxSize = Math.max(2, maxSize);
  }

  get turns(): readonly ConversationTurn[] { return this._turns; }
  get size(): number { return this._turns.length; }

  /** Record one exchange. Evicts the oldest pair at capacity. */
  push(prompt: string, reply: string): void {
    const timestamp = new Date().toISOString();
    this._turns.push(
      { role: 'user', content: prompt, timestamp },
      { role: 'assistant', content: reply, timestamp },
    );
    while (this._turns.length > this._maxSize) {
      this._turns.splice(0, 2);
    }
  }

  /** True when the same line (ignoring numbers and punctuation) was said recently. */
  isRepeat(reply: string): boolean {
    const candidate = normalizeLine(reply);
    if (!candidate) return false;
    return this._turns.some(turn => turn.role === 'assistant' && normalizeLine(turn.content) === candidate);
  }

  /** History in model message order. */
  toMessages(): Array<{ role: 'user' | 'assistant'; content: string }> {
    return this._turns.map(({ role, content }) => ({ role, content }));
  }

  clear(): void {
    this._turns = [];
  }
}
