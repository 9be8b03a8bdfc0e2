// worldcore/core/Heartbeat.ts

import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import { Logger } from "../utils/logger";
import type { InteractionHub } from "./InteractionHub";
import type { SessionManager } from "./SessionManager";

export interface HeartbeatConfig {
  intervalMs: number; // how often to sweep sessions
  idleTimeoutMs: number; // how long before we drop an idle session
}

const log = Logger.scope("HEARTBEAT");

/**
 * Drop every session idle longer than idleTimeoutMs, tearing down its
 * interaction runtime first. Returns how many were removed.
 */
export function sweepIdleSessions(
  sessions: SessionManager,
  hub: InteractionHub,
  idleTimeoutMs: number,
  now: number,
): number {
  let timedOut = 0;

  for (const session of [...sessions.getAllSessions()]) {
    const delta = now - session.lastSeen;
    if (delta <= idleTimeoutMs) continue;

    timedOut++;
    log.info("Removing idle session", {
      sessionId: session.id,
      idleMs: delta,
    });

    try {
      hub.detach(session.id);
    } catch (err) {
      log.warn("Error detaching idle session", {
        sessionId: session.id,
        err,
      });
    }

    sessions.removeSession(session.id);
  }

  return timedOut;
}

/**
 * Coarse idle-session cleanup loop. Gameplay ticks are TickEngine's job.
 */
export function startHeartbeat(
  sessions: SessionManager,
  hub: InteractionHub,
  cfg: HeartbeatConfig,
  clock: Clock = systemClock,
): NodeJS.Timeout {
  // No sub-second sweeps.
  const intervalMs = Math.max(cfg.intervalMs, 1000);
  const idleTimeoutMs = Math.max(cfg.idleTimeoutMs, intervalMs * 2);

  log.info("Starting heartbeat", {
    intervalMs,
    idleTimeoutMs,
  });

  let sweepCount = 0;

  const handle = setInterval(() => {
    sweepCount++;
    const timedOut = sweepIdleSessions(sessions, hub, idleTimeoutMs, clock.now());

    // Only log summaries occasionally or when we actually did work
    if (timedOut > 0 || sweepCount % 30 === 0) {
      log.debug("Heartbeat sweep complete", {
        sweep: sweepCount,
        activeSessions: sessions.count(),
        timedOut,
      });
    }
  }, intervalMs);

  handle.unref?.();

  return handle;
}
