// worldcore/utils/withTimeout.ts

import { CollaboratorTimeoutError } from "../actions/ActionErrors";

/**
 * Race `work` against a timer. On timeout the returned promise rejects with
 * CollaboratorTimeoutError; `work` itself keeps running and its eventual
 * rejection is observed so it never surfaces as unhandled.
 */
export function withTimeout<T>(work: Promise<T>, timeoutMs: number, operation: string): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      reject(new CollaboratorTimeoutError(operation, timeoutMs));
    }, timeoutMs);

    work.then(
      (value) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        resolve(value);
      },
      (err: unknown) => {
        clearTimeout(timer);
        if (settled) return;
        settled = true;
        reject(err);
      },
    );
  });
}
