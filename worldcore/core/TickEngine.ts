// worldcore/core/TickEngine.ts

import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import { Logger } from "../utils/logger";
import type { InteractionHub } from "./InteractionHub";
import type { SessionManager } from "./SessionManager";

export interface TickEngineConfig {
  intervalMs: number; // tick interval (e.g. 100ms for 10 TPS)

  /**
   * Optional hook invoked once per tick with:
   *  - nowMs: clock time for this tick
   *  - tick: current tick count (starting at 1)
   *  - deltaMs: elapsed time since previous tick (ms)
   */
  onTick?: (nowMs: number, tick: number, deltaMs: number) => void;
}

/**
 * Fixed-interval loop that:
 *  - runs one targeting pass per attached session (InteractionHub.tick)
 *  - calls an onTick hook for anything else that wants a heartbeat
 *  - logs basic session stats every N ticks
 */
export class TickEngine {
  private readonly log = Logger.scope("TICK");
  private readonly intervalMs: number;

  private running = false;
  private handle: NodeJS.Timeout | null = null;
  private tickCount = 0;

  private lastTickAt: number | null = null;

  constructor(
    private readonly hub: InteractionHub,
    private readonly sessions: SessionManager,
    private readonly cfg: TickEngineConfig,
    private readonly clock: Clock = systemClock,
  ) {
    this.intervalMs = Math.max(cfg.intervalMs, 10);
  }

  start(): void {
    if (this.running) return;
    this.running = true;

    this.lastTickAt = this.clock.now();

    this.log.info("Starting TickEngine", {
      intervalMs: this.intervalMs,
    });

    this.handle = setInterval(() => this.tick(), this.intervalMs);
    this.handle.unref?.();
  }

  stop(): void {
    if (!this.running) return;
    this.running = false;

    if (this.handle) {
      clearInterval(this.handle);
      this.handle = null;
    }

    this.log.info("TickEngine stopped", {
      lastTick: this.tickCount,
    });
  }

  get ticks(): number {
    return this.tickCount;
  }

  /** One tick. The interval calls this; tests call it directly. */
  tick(): void {
    this.tickCount++;

    const now = this.clock.now();
    const deltaMs = this.lastTickAt !== null ? now - this.lastTickAt : this.intervalMs;
    this.lastTickAt = now;

    let evaluated = 0;
    try {
      evaluated = this.hub.tick(deltaMs);
    } catch (err) {
      this.log.warn("Error during InteractionHub.tick", {
        error: String(err),
      });
    }

    try {
      this.cfg.onTick?.(now, this.tickCount, deltaMs);
    } catch (err) {
      this.log.warn("Error in TickEngine onTick hook", {
        error: String(err),
      });
    }

    if (this.tickCount % 20 === 0) {
      this.log.debug("Tick summary", {
        tick: this.tickCount,
        sessions: this.sessions.count(),
        participants: this.hub.size,
        evaluated,
        deltaMs,
      });
    }
  }
}
