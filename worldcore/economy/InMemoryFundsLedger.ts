// worldcore/economy/InMemoryFundsLedger.ts

import type { ParticipantId } from "../shared/InteractableObject";
import {
  DEFAULT_MAX_BALANCE,
  DEFAULT_STARTING_BALANCE,
  type FundsLedger,
  type LedgerOptions,
} from "./FundsLedger";

export class InMemoryFundsLedger implements FundsLedger {
  private readonly balances = new Map<ParticipantId, number>();
  private readonly startingBalance: number;
  private readonly maxBalance: number;

  constructor(opts: LedgerOptions = {}, seed: Record<ParticipantId, number> = {}) {
    this.startingBalance = opts.startingBalance ?? DEFAULT_STARTING_BALANCE;
    this.maxBalance = opts.maxBalance ?? DEFAULT_MAX_BALANCE;
    for (const [id, amount] of Object.entries(seed)) this.balances.set(id, amount);
  }

  async getBalance(participantId: ParticipantId): Promise<number> {
    return this.current(participantId);
  }

  async deduct(participantId: ParticipantId, amount: number): Promise<boolean> {
    if (!(amount >= 0)) return false;

    const balance = this.current(participantId);
    if (balance < amount) return false;

    this.balances.set(participantId, balance - amount);
    return true;
  }

  async credit(participantId: ParticipantId, amount: number): Promise<number> {
    const next = Math.min(this.maxBalance, this.current(participantId) + Math.max(0, amount));
    this.balances.set(participantId, next);
    return next;
  }

  async refund(participantId: ParticipantId, amount: number): Promise<number> {
    const next = this.current(participantId) + Math.max(0, amount);
    this.balances.set(participantId, next);
    return next;
  }

  private current(participantId: ParticipantId): number {
    return this.balances.get(participantId) ?? this.startingBalance;
  }
}
