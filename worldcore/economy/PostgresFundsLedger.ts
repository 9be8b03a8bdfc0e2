// worldcore/economy/PostgresFundsLedger.ts

import { Logger } from "../utils/logger";
import type { ParticipantId } from "../shared/InteractableObject";
import { readNumeric, resolveQueryable, type Queryable } from "../db/Queryable";
import {
  DEFAULT_MAX_BALANCE,
  DEFAULT_STARTING_BALANCE,
  type FundsLedger,
  type LedgerOptions,
} from "./FundsLedger";

const log = Logger.scope("LEDGER");

/**
 * participant_balances-backed ledger.
 *
 * Every operation is a single statement, so it is atomic per participant
 * without an explicit transaction. deduct() relies on the conditional
 * UPDATE: two concurrent spends can never both pass the balance check.
 */
export class PostgresFundsLedger implements FundsLedger {
  private readonly startingBalance: number;
  private readonly maxBalance: number;

  constructor(
    opts: LedgerOptions = {},
    private readonly queryable?: Queryable,
  ) {
    this.startingBalance = opts.startingBalance ?? DEFAULT_STARTING_BALANCE;
    this.maxBalance = opts.maxBalance ?? DEFAULT_MAX_BALANCE;
  }

  async getBalance(participantId: ParticipantId): Promise<number> {
    const q = await resolveQueryable(this.queryable);

    const res = await q.query(
      `
      INSERT INTO participant_balances (participant_id, balance)
      VALUES ($1, $2)
      ON CONFLICT (participant_id)
      DO UPDATE SET balance = participant_balances.balance
      RETURNING balance
      `,
      [participantId, this.startingBalance],
    );

    const balance = readNumeric(res.rows[0], "balance");
    if (balance === null) {
      log.warn("Balance row missing after upsert", { participantId });
      return 0;
    }
    return balance;
  }

  async deduct(participantId: ParticipantId, amount: number): Promise<boolean> {
    if (!(amount >= 0)) return false;
    const q = await resolveQueryable(this.queryable);

    // Make sure the row exists so a first-time spender is judged on the opening balance.
    await this.getBalance(participantId);

    const res = await q.query(
      `
      UPDATE participant_balances
      SET balance = balance - $2, updated_at = NOW()
      WHERE participant_id = $1 AND balance >= $2
      RETURNING balance
      `,
      [participantId, amount],
    );

    const ok = (res.rowCount ?? 0) > 0;
    if (!ok) {
      log.debug("Deduct refused", { participantId, amount });
    }
    return ok;
  }

  async credit(participantId: ParticipantId, amount: number): Promise<number> {
    const q = await resolveQueryable(this.queryable);

    const res = await q.query(
      `
      INSERT INTO participant_balances (participant_id, balance)
      VALUES ($1, LEAST($2::numeric + $3::numeric, $4::numeric))
      ON CONFLICT (participant_id)
      DO UPDATE SET
        balance = LEAST(participant_balances.balance + $3::numeric, $4::numeric),
        updated_at = NOW()
      RETURNING balance
      `,
      [participantId, this.startingBalance, Math.max(0, amount), this.maxBalance],
    );

    const balance = readNumeric(res.rows[0], "balance");
    if (balance === null) {
      throw new Error(`credit returned no balance for ${participantId}`);
    }
    return balance;
  }

  async refund(participantId: ParticipantId, amount: number): Promise<number> {
    const q = await resolveQueryable(this.queryable);

    const res = await q.query(
      `
      INSERT INTO participant_balances (participant_id, balance)
      VALUES ($1, $2::numeric + $3::numeric)
      ON CONFLICT (participant_id)
      DO UPDATE SET
        balance = participant_balances.balance + $3::numeric,
        updated_at = NOW()
      RETURNING balance
      `,
      [participantId, this.startingBalance, Math.max(0, amount)],
    );

    const balance = readNumeric(res.rows[0], "balance");
    if (balance === null) {
      throw new Error(`refund returned no balance for ${participantId}`);
    }
    return balance;
  }
}
