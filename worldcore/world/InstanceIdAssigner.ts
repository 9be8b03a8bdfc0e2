// worldcore/world/InstanceIdAssigner.ts

import { newInstanceId } from "../utils/uuid";
import { Logger } from "../utils/logger";

const log = Logger.scope("WORLD");

export const MAX_INSTANCE_ID_RETRIES = 3;

/**
 * Pick an instance id that `isTaken` does not already know about.
 * Returns null after MAX_INSTANCE_ID_RETRIES collisions; callers treat
 * that as a failed mutation, never as a reason to reuse an id.
 */
export function assignInstanceId(
  isTaken: (instanceId: string) => boolean,
  generate: () => string = newInstanceId,
): string | null {
  for (let attempt = 1; attempt <= MAX_INSTANCE_ID_RETRIES; attempt++) {
    const candidate = generate();
    if (candidate && !isTaken(candidate)) return candidate;

    log.warn("Instance id collision", { attempt, candidate });
  }

  log.error("Exhausted retries assigning an instance id");
  return null;
}
