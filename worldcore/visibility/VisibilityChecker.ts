// worldcore/visibility/VisibilityChecker.ts
//
// Multi-sample occlusion test.
//
// Algorithm:
//  1. N sample points on the candidate's box (see SamplePoints).
//  2. One segment from the observer's eye to each sample.
//  3. A sample is clear when nothing that blocks sits between eye and sample.
//  4. clearFraction = clear / N.
//  5. Visible iff clearFraction >= minClearFraction AND distance <= limit.
//
// Results are cached per (observer, target, quantized eye) for a short TTL.
// Engine errors fail closed (not visible) and are never cached.

import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import type { InteractableObject, ObjectKey } from "../shared/InteractableObject";
import { objectKey } from "../shared/InteractableObject";
import type { Vec3 } from "../shared/Vec3";
import { distance, quantize } from "../shared/Vec3";
import type { InteractionConfig } from "../config/interactionConfig";
import { Logger } from "../utils/logger";
import type { RayCaster, SurfaceKind } from "./RayCaster";
import { makeBlockingFilter } from "./RayCaster";
import { generateSamplePoints, sampleCountFor } from "./SamplePoints";
import { VisibilityCache, type CachedRayResult } from "./VisibilityCache";

const log = Logger.scope("VISIBILITY");

export type VisibilityReason = "visible" | "occluded" | "out_of_range" | "error";

export interface VisibilityVerdict {
  observerId: string;
  targetKey: ObjectKey;
  quantizedObserverPosition: Vec3;
  clearFraction: number;
  clearCount: number;
  sampleCount: number;
  distance: number;
  isVisible: boolean;
  reason: VisibilityReason;
  /** When the ray result was produced (earlier than now on a cache hit). */
  computedAt: number;
  fromCache: boolean;
}

export interface ObserverEye {
  observerId: string;
  eye: Vec3;
  /** Point the range limit is measured from; the eye when absent. */
  rangeFrom?: Vec3;
}

export interface VisibilityCheckOptions {
  /** Distance limit for this call; defaults to maxInteractionDistance. */
  maxDistance?: number;
}

export type VisibilityConfig = Pick<
  InteractionConfig,
  | "maxInteractionDistance"
  | "minClearFraction"
  | "raysPerObject"
  | "visibilityCacheTTL"
  | "visibilityCacheMaxEntries"
  | "cacheQuantum"
  | "nonBlockingSurfaces"
  | "transparentSurfacesBlock"
>;

/** Clear rays needed out of n, compared in whole rays. */
export function requiredClearRays(minClearFraction: number, n: number): number {
  return Math.max(0, Math.ceil(minClearFraction * n - 1e-9));
}

export class VisibilityChecker {
  private readonly cache: VisibilityCache;
  private readonly blocks: (surface: SurfaceKind) => boolean;

  constructor(
    private readonly rays: RayCaster,
    private readonly cfg: VisibilityConfig,
    private readonly clock: Clock = systemClock,
  ) {
    this.cache = new VisibilityCache(cfg.visibilityCacheTTL, cfg.visibilityCacheMaxEntries);
    this.blocks = makeBlockingFilter(cfg);
  }

  check(
    observer: ObserverEye,
    target: InteractableObject,
    opts: VisibilityCheckOptions = {},
  ): VisibilityVerdict {
    const now = this.clock.now();
    const targetKey = objectKey(target);
    const qPos = quantize(observer.eye, this.cfg.cacheQuantum);
    const dist = distance(observer.rangeFrom ?? observer.eye, target.position);
    const limit = opts.maxDistance ?? this.cfg.maxInteractionDistance;

    const base = {
      observerId: observer.observerId,
      targetKey,
      quantizedObserverPosition: qPos,
      distance: dist,
    };

    const cacheKey = `${observer.observerId}|${targetKey}|${qPos.x},${qPos.y},${qPos.z}`;
    const cached = this.cache.get(cacheKey, now);

    // Out of range never costs rays; report whatever we already know.
    if (dist > limit) {
      return {
        ...base,
        clearCount: cached?.clearCount ?? 0,
        sampleCount: cached?.sampleCount ?? 0,
        clearFraction: cached ? cached.clearCount / cached.sampleCount : 0,
        isVisible: false,
        reason: "out_of_range",
        computedAt: cached?.computedAt ?? now,
        fromCache: cached !== null,
      };
    }

    if (cached) {
      return this.toVerdict(base, cached, true);
    }

    let result: CachedRayResult;
    try {
      result = this.castSamples(observer, target, targetKey, now);
    } catch (err) {
      log.warn("Ray cast failed; treating target as not visible", {
        observerId: observer.observerId,
        targetKey,
        err: String(err),
      });
      return {
        ...base,
        clearCount: 0,
        sampleCount: 0,
        clearFraction: 0,
        isVisible: false,
        reason: "error",
        computedAt: now,
        fromCache: false,
      };
    }

    this.cache.set(cacheKey, result);
    return this.toVerdict(base, result, false);
  }

  /** Drop cached verdicts for an observer (disconnect). */
  forgetObserver(observerId: string): void {
    this.cache.forgetObserver(observerId);
  }

  get cacheSize(): number {
    return this.cache.size;
  }

  private castSamples(
    observer: ObserverEye,
    target: InteractableObject,
    targetKey: ObjectKey,
    now: number,
  ): CachedRayResult {
    const n = sampleCountFor(target.size, this.cfg.raysPerObject);
    const samples = generateSamplePoints(target.position, target.size, n);

    // The target's own box and the observer's avatar never occlude.
    const ignoreIds = new Set<string>([targetKey, observer.observerId]);

    let clearCount = 0;
    for (const sample of samples) {
      const hit = this.rays.castSegment({
        origin: observer.eye,
        target: sample,
        ignoreIds,
        blocks: this.blocks,
      });
      if (!hit) clearCount++;
    }

    return { clearCount, sampleCount: samples.length, computedAt: now };
  }

  private toVerdict(
    base: Pick<VisibilityVerdict, "observerId" | "targetKey" | "quantizedObserverPosition" | "distance">,
    r: CachedRayResult,
    fromCache: boolean,
  ): VisibilityVerdict {
    const needed = requiredClearRays(this.cfg.minClearFraction, r.sampleCount);
    const isVisible = r.clearCount >= needed;

    return {
      ...base,
      clearCount: r.clearCount,
      sampleCount: r.sampleCount,
      clearFraction: r.sampleCount > 0 ? r.clearCount / r.sampleCount : 0,
      isVisible,
      reason: isVisible ? "visible" : "occluded",
      computedAt: r.computedAt,
      fromCache,
    };
  }
}
