// worldcore/db/Queryable.ts

import { isRecord } from "../utils/guards";

/**
 * Minimal query surface the Postgres-backed services use. pg's Pool
 * satisfies it; tests hand in a scripted fake. Rows come back untyped and
 * are narrowed by the caller.
 */
export interface Queryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[]; rowCount: number | null }>;
}

/**
 * Injected Queryable, or the shared pool. The pool module is imported
 * lazily so loading a service never opens a socket.
 */
export async function resolveQueryable(injected?: Queryable): Promise<Queryable> {
  if (injected) return injected;
  const { db } = await import("./Database");
  return db;
}

/** pg returns NUMERIC/BIGINT as strings; accept either. */
export function readNumeric(row: unknown, column: string): number | null {
  if (!isRecord(row)) return null;
  const raw = row[column];
  const n = typeof raw === "number" ? raw : typeof raw === "string" ? Number(raw) : NaN;
  return Number.isFinite(n) ? n : null;
}

export function readString(row: unknown, column: string): string | null {
  if (!isRecord(row)) return null;
  const raw = row[column];
  return typeof raw === "string" ? raw : null;
}
