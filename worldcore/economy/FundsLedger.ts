// worldcore/economy/FundsLedger.ts

import type { ParticipantId } from "../shared/InteractableObject";

export interface FundsLedger {
  /** Current balance; unknown participants start at the ledger's opening balance. */
  getBalance(participantId: ParticipantId): Promise<number>;

  /**
   * Atomically subtract `amount` if the balance covers it.
   * false means nothing was taken.
   */
  deduct(participantId: ParticipantId, amount: number): Promise<boolean>;

  /** Add funds (rewards), capped at the ledger's maxBalance. Returns the new balance. */
  credit(participantId: ParticipantId, amount: number): Promise<number>;

  /**
   * Give back an amount deduct() took. Never capped: whatever was taken
   * comes back in full. Returns the new balance.
   */
  refund(participantId: ParticipantId, amount: number): Promise<number>;
}

export interface LedgerOptions {
  startingBalance?: number;
  maxBalance?: number;
}

export const DEFAULT_STARTING_BALANCE = 100;
export const DEFAULT_MAX_BALANCE = 999_999;
