// worldcore/targeting/TargetTracker.ts
//
// Per-observer "what am I looking at" selection, run every tick.
//
// - Acquisition: nearest visible candidate within targetingRadius (and the
//   field of view, when one is configured). Ties: item id, then object key.
// - Retention: the current target is kept out to
//   targetingRadius × retentionFactor while it stays visible, unless a
//   challenger is closer by more than hysteresisMargin.
// - The tracker never mutates the world; a failing candidate source counts
//   as "no candidates" for that tick only.

import type { InteractionConfig } from "../config/interactionConfig";
import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import type { InteractableObject, ObjectKey } from "../shared/InteractableObject";
import { objectKey } from "../shared/InteractableObject";
import type { Vec3 } from "../shared/Vec3";
import { distance } from "../shared/Vec3";
import { Logger } from "../utils/logger";
import type { VisibilityChecker, VisibilityVerdict } from "../visibility/VisibilityChecker";
import type { CandidateSource } from "../world/WorldIndex";

const log = Logger.scope("TARGETING");

export interface ObserverPose {
  /** Feet position; the eye sits eyeHeight above it. */
  position: Vec3;
  /** Look direction. Only its horizontal part is used. */
  facing?: Vec3;
}

export type TargetLostReason = "out_of_range" | "occluded" | "destroyed" | "source_unavailable";

export type TargetEvaluation =
  | { kind: "unchanged"; current: InteractableObject | null }
  | { kind: "acquired"; object: InteractableObject; previous: InteractableObject | null }
  | { kind: "lost"; previous: InteractableObject; reason: TargetLostReason };

export interface ObserverTargetState {
  currentCandidate: InteractableObject | null;
  acquiredAt: number | null;
  lastVisibilityVerdict: VisibilityVerdict | null;
}

export type TrackerConfig = Pick<
  InteractionConfig,
  | "targetingRadius"
  | "retentionFactor"
  | "hysteresisMargin"
  | "fieldOfViewDeg"
  | "maxInteractionDistance"
  | "eyeHeight"
>;

interface Ranked {
  object: InteractableObject;
  key: ObjectKey;
  distance: number;
}

function compareRanked(a: Ranked, b: Ranked): number {
  if (a.distance !== b.distance) return a.distance - b.distance;
  if (a.object.id !== b.object.id) return a.object.id < b.object.id ? -1 : 1;
  if (a.key !== b.key) return a.key < b.key ? -1 : 1;
  return 0;
}

/** True when `target` lies inside the horizontal cone around `facing`. */
export function withinFieldOfView(
  origin: Vec3,
  facing: Vec3 | undefined,
  target: Vec3,
  fieldOfViewDeg: number,
): boolean {
  if (fieldOfViewDeg >= 360 || !facing) return true;

  const fLen = Math.hypot(facing.x, facing.z);
  const dx = target.x - origin.x;
  const dz = target.z - origin.z;
  const tLen = Math.hypot(dx, dz);
  if (fLen === 0 || tLen === 0) return true;

  const cos = (facing.x * dx + facing.z * dz) / (fLen * tLen);
  const angleDeg = (Math.acos(Math.min(1, Math.max(-1, cos))) * 180) / Math.PI;
  return angleDeg <= fieldOfViewDeg / 2;
}

export class TargetTracker {
  private current: InteractableObject | null = null;
  private acquiredAt: number | null = null;
  private lastVerdict: VisibilityVerdict | null = null;
  private elapsedMs = 0;

  constructor(
    readonly observerId: string,
    private readonly source: CandidateSource,
    private readonly visibility: VisibilityChecker,
    private readonly cfg: TrackerConfig,
    private readonly clock: Clock = systemClock,
  ) {}

  get state(): ObserverTargetState {
    return {
      currentCandidate: this.current,
      acquiredAt: this.acquiredAt,
      lastVisibilityVerdict: this.lastVerdict,
    };
  }

  /** Total simulated time fed through tick(). */
  get elapsed(): number {
    return this.elapsedMs;
  }

  tick(dtMs: number, pose: ObserverPose): TargetEvaluation {
    if (Number.isFinite(dtMs) && dtMs > 0) this.elapsedMs += dtMs;
    return this.evaluate(pose);
  }

  evaluate(pose: ObserverPose): TargetEvaluation {
    // Range is measured from the feet; rays leave the eye.
    const eye: Vec3 = { x: pose.position.x, y: pose.position.y + this.cfg.eyeHeight, z: pose.position.z };
    const retention = this.cfg.targetingRadius * this.cfg.retentionFactor;

    let candidates: InteractableObject[];
    try {
      candidates = [...this.source.enumerateNearby(pose.position, retention)];
    } catch (err) {
      log.warn("Candidate source failed; skipping tick", { observerId: this.observerId, err });
      return this.current ? this.lose("source_unavailable") : { kind: "unchanged", current: null };
    }

    const ranked: Ranked[] = candidates
      .map((object) => ({ object, key: objectKey(object), distance: distance(pose.position, object.position) }))
      .sort(compareRanked);

    // Re-validate the current target first; it sets the bar for challengers.
    let kept: Ranked | null = null;
    let lostReason: TargetLostReason | null = null;

    if (this.current) {
      const key = objectKey(this.current);
      const entry = ranked.find((r) => r.key === key) ?? null;

      if (!entry) {
        lostReason = this.source.contains && !this.source.contains(key) ? "destroyed" : "out_of_range";
      } else if (entry.distance > retention) {
        lostReason = "out_of_range";
      } else {
        const verdict = this.visibility.check(
          { observerId: this.observerId, eye, rangeFrom: pose.position },
          entry.object,
          { maxDistance: Math.max(retention, this.cfg.maxInteractionDistance) },
        );
        this.lastVerdict = verdict;
        if (verdict.isVisible) kept = entry;
        else lostReason = verdict.reason === "out_of_range" ? "out_of_range" : "occluded";
      }
    }

    const challenger = this.bestVisible(ranked, eye, pose, kept);

    if (kept && !challenger) {
      this.current = kept.object;
      return { kind: "unchanged", current: kept.object };
    }

    if (challenger) {
      const previous = this.current;
      this.current = challenger.object;
      this.acquiredAt = this.clock.now();
      log.debug("Target acquired", {
        observerId: this.observerId,
        targetKey: challenger.key,
        distance: challenger.distance,
        replaced: previous ? objectKey(previous) : null,
      });
      return { kind: "acquired", object: challenger.object, previous };
    }

    if (this.current && lostReason) return this.lose(lostReason);

    return { kind: "unchanged", current: null };
  }

  /** Disconnect / world exit. */
  clear(): void {
    this.current = null;
    this.acquiredAt = null;
    this.lastVerdict = null;
    this.elapsedMs = 0;
    this.visibility.forgetObserver(this.observerId);
  }

  private bestVisible(
    ranked: Ranked[],
    eye: Vec3,
    pose: ObserverPose,
    kept: Ranked | null,
  ): Ranked | null {
    const bar = kept ? kept.distance * (1 - this.cfg.hysteresisMargin) : Infinity;

    for (const r of ranked) {
      // Sorted by distance: nothing further on can beat the bar or the radius.
      if (r.distance >= bar || r.distance > this.cfg.targetingRadius) break;
      if (kept && r.key === kept.key) continue;
      if (!withinFieldOfView(pose.position, pose.facing, r.object.position, this.cfg.fieldOfViewDeg)) {
        continue;
      }

      const verdict = this.visibility.check(
        { observerId: this.observerId, eye, rangeFrom: pose.position },
        r.object,
      );
      if (verdict.isVisible) {
        this.lastVerdict = verdict;
        return r;
      }
    }
    return null;
  }

  private lose(reason: TargetLostReason): TargetEvaluation {
    const previous = this.current;
    this.current = null;
    this.acquiredAt = null;
    if (!previous) return { kind: "unchanged", current: null };

    log.debug("Target lost", { observerId: this.observerId, targetKey: objectKey(previous), reason });
    return { kind: "lost", previous, reason };
  }
}
