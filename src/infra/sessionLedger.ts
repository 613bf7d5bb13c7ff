/**
 * In-process ledger of completed sessions.
 *
 * Session state itself travels with every request; the only server-side
 * record is which session ids have finished (and for which player), so a
 * replayed snapshot of a completed session cannot keep playing. Entries
 * expire after `ttlMs` and the oldest are evicted beyond `maxEntries`.
 */

import type { PlayerRecord, SessionLedger } from '../domain/engine.js';
import type { SessionOutcome } from '../domain/state.js';

export interface ClosedSession {
  outcome: SessionOutcome;
  closedAtMs: number;
  playerId: string | null;
}

export interface SessionLedgerOptions {
  now?: () => number;
  /** How long a closed session is remembered; defaults to one day */
  ttlMs?: number;
  /** Upper bound on remembered sessions */
  maxEntries?: number;
}

export const DEFAULT_LEDGER_TTL_MS = 24 * 60 * 60 * 1000;
export const DEFAULT_LEDGER_MAX_ENTRIES = 10_000;

export class InMemorySessionLedger implements SessionLedger {
  // Insertion order is close order, so the oldest entries come first
  private readonly closed = new Map<string, ClosedSession>();
  private readonly now: () => number;
  private readonly ttlMs: number;
  private readonly maxEntries: number;

  constructor(options: SessionLedgerOptions = {}) {
    this.now = options.now ?? Date.now;
    this.ttlMs = options.ttlMs ?? DEFAULT_LEDGER_TTL_MS;
    this.maxEntries = options.maxEntries ?? DEFAULT_LEDGER_MAX_ENTRIES;
  }

  async isClosed(sessionId: string): Promise<boolean> {
    this.prune();
    return this.closed.has(sessionId);
  }

  async close(sessionId: string, outcome: SessionOutcome, playerId: string | null): Promise<void> {
    this.prune();
    // First close wins; the outcome of a finished session never changes
    if (this.closed.has(sessionId)) {
      return;
    }
    this.closed.set(sessionId, { outcome, closedAtMs: this.now(), playerId });
    this.prune();
  }

  async recordFor(playerId: string): Promise<PlayerRecord> {
    this.prune();
    const record: PlayerRecord = { playerId, sessionsCompleted: 0, successes: 0, failures: 0 };
    for (const entry of this.closed.values()) {
      if (entry.playerId !== playerId) {
        continue;
      }
      record.sessionsCompleted += 1;
      if (entry.outcome === 'success') {
        record.successes += 1;
      } else {
        record.failures += 1;
      }
    }
    return record;
  }

  get(sessionId: string): ClosedSession | undefined {
    return this.closed.get(sessionId);
  }

  get size(): number {
    return this.closed.size;
  }

  private prune(): void {
    const cutoff = this.now() - this.ttlMs;
    for (const [sessionId, entry] of this.closed) {
      if (entry.closedAtMs > cutoff && this.closed.size <= this.maxEntries) {
        break;
      }
      this.closed.delete(sessionId);
    }
  }
}
