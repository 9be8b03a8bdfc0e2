// worldcore/actions/IdempotencyStore.ts
//
// Applied results by (requester, correlation token). Only applied verdicts
// are recorded; a rejected token may be retried and re-validated.

import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import type { ParticipantId } from "../shared/InteractableObject";
import type { ActionApplied } from "./ActionErrors";

export interface IdempotencyStore {
  lookup(requesterId: ParticipantId, token: string): ActionApplied | null;
  record(requesterId: ParticipantId, token: string, verdict: ActionApplied): void;
}

interface Entry {
  verdict: ActionApplied;
  expiresAt: number;
}

export class InMemoryIdempotencyStore implements IdempotencyStore {
  private readonly entries = new Map<string, Entry>();

  constructor(
    private readonly ttlMs: number,
    private readonly clock: Clock = systemClock,
  ) {}

  lookup(requesterId: ParticipantId, token: string): ActionApplied | null {
    const key = entryKey(requesterId, token);
    const entry = this.entries.get(key);
    if (!entry) return null;

    if (entry.expiresAt <= this.clock.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry.verdict;
  }

  record(requesterId: ParticipantId, token: string, verdict: ActionApplied): void {
    const now = this.clock.now();
    this.entries.set(entryKey(requesterId, token), { verdict, expiresAt: now + this.ttlMs });
    this.sweep(now);
  }

  get size(): number {
    return this.entries.size;
  }

  // Map iteration is insertion order, so expired entries cluster at the front.
  private sweep(now: number): void {
    for (const [key, entry] of this.entries) {
      if (entry.expiresAt > now) break;
      this.entries.delete(key);
    }
  }
}

function entryKey(requesterId: ParticipantId, token: string): string {
  return `${requesterId}|${token}`;
}
