//worldcore/utils/uuid.ts

import { randomUUID } from "crypto";

export function uuidv4(): string {
  return randomUUID();
}

/** Opaque idempotency key for an ActionRequest. */
export function newCorrelationToken(): string {
  return `act_${uuidv4()}`;
}

/** Instance id for a freshly placed object (Clone). */
export function newInstanceId(): string {
  return `inst_${uuidv4()}`;
}
