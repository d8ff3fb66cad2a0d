/**
 * @netlens/gateway - Conversation history
 *
 * Keeps the most recent assistant turns per session, in memory. The oldest
 * turn is dropped once a session reaches its limit, and the least recently
 * active session is dropped once `maxSessions` is reached.
 */

import { nanoid } from 'nanoid';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface HistoryTurn {
  id: string;
  question: string;
  tool: string | null;
  answer: string;
  provider: string;
  confidence: string;
  /** ISO timestamp. */
  at: string;
}

export type NewHistoryTurn = Omit<HistoryTurn, 'id' | 'at'>;

export interface ConversationHistoryOptions {
  /** Turns kept per session. */
  limit: number;
  maxSessions?: number;
  now?: () => Date;
}

// ---------------------------------------------------------------------------
// ConversationHistory
// ---------------------------------------------------------------------------

export class ConversationHistory {
  private readonly sessions = new Map<string, HistoryTurn[]>();
  private readonly limit: number;
  private readonly maxSessions: number;
  private readonly now: () => Date;

  constructor(options: ConversationHistoryOptions) {
    if (!Number.isInteger(options.limit) || options.limit < 1) {
      throw new RangeError(`limit must be a positive integer (got ${options.limit})`);
    }
    this.limit = options.limit;
    this.maxSessions = options.maxSessions ?? 1000;
    this.now = options.now ?? (() => new Date());
  }

  record(sessionId: string, turn: NewHistoryTurn): HistoryTurn {
    const entry: HistoryTurn = { id: nanoid(), ...turn, at: this.now().toISOString() };

    const turns = this.sessions.get(sessionId) ?? [];
    // Re-insert so Map order tracks recent activity
    this.sessions.delete(sessionId);
    turns.push(entry);
    if (turns.length > this.limit) {
      turns.splice(0, turns.length - this.limit);
    }
    this.sessions.set(sessionId, turns);

    if (this.sessions.size > this.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (!oldest.done) this.sessions.delete(oldest.value);
    }
    return entry;
  }

  /** Turns for a session, oldest first. */
  list(sessionId: string): HistoryTurn[] {
    return [...(this.sessions.get(sessionId) ?? [])];
  }

  get sessionCount(): number {
    return this.sessions.size;
  }
}
