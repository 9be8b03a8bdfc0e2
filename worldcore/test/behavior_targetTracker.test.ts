// worldcore/test/behavior_targetTracker.test.ts
//
// Behavior: nearest-visible acquisition, retention with hysteresis, and the
// reasons a target is lost.

import test from "node:test";
import assert from "node:assert/strict";

import type { InteractionConfigOverrides } from "../config/interactionConfig";
import { ManualClock } from "../shared/Clock";
import type { CatalogObject, InteractableObject, PlacedObject } from "../shared/InteractableObject";
import { objectKey } from "../shared/InteractableObject";
import type { Vec3 } from "../shared/Vec3";
import { TargetTracker, withinFieldOfView, type TargetEvaluation } from "../targeting/TargetTracker";
import { VisibilityChecker } from "../visibility/VisibilityChecker";
import { InMemoryWorldStore } from "../world/InMemoryWorldStore";
import type { CandidateSource } from "../world/WorldIndex";
import { ScriptedRayCaster, makeCatalog, makePlaced, testConfig, v } from "./testUtils";

interface Rig {
  world: InMemoryWorldStore;
  tracker: TargetTracker;
  visibility: VisibilityChecker;
  clock: ManualClock;
  blocked: { value: boolean };
}

function rig(
  seed: { catalog?: CatalogObject[]; placed?: PlacedObject[] },
  overrides: InteractionConfigOverrides = {},
  source?: (world: InMemoryWorldStore) => CandidateSource,
): Rig {
  // No caching unless a test asks for it: each evaluation casts fresh rays.
  const cfg = testConfig({ visibilityCacheTTL: 0, ...overrides });
  const clock = new ManualClock(1_000);
  const blocked = { value: false };
  const world = new InMemoryWorldStore(seed);
  const visibility = new VisibilityChecker(new ScriptedRayCaster(() => blocked.value), cfg, clock);
  const tracker = new TargetTracker("alice", source ? source(world) : world, visibility, cfg, clock);
  return { world, tracker, visibility, clock, blocked };
}

const origin: { position: Vec3 } = { position: v(0, 0, 0) };

function keyOf(ev: TargetEvaluation): string | null {
  switch (ev.kind) {
    case "acquired":
      return objectKey(ev.object);
    case "lost":
      return objectKey(ev.previous);
    case "unchanged":
      return ev.current ? objectKey(ev.current) : null;
  }
}

function cube(id: string, position: Vec3): CatalogObject {
  return makeCatalog({ id, position });
}

test("[behavior] tracker: acquires the nearest visible candidate", () => {
  const { tracker } = rig({ catalog: [cube("far_cube", v(5, 0, 0)), cube("near_cube", v(3, 0, 0))] });

  const ev = tracker.evaluate(origin);
  assert.equal(ev.kind, "acquired");
  assert.equal(keyOf(ev), "catalog:near_cube");
  assert.equal(tracker.state.currentCandidate?.id, "near_cube");
  assert.equal(tracker.state.acquiredAt, 1_000);
});

test("[behavior] tracker: equal distances break ties by item id", () => {
  const { tracker } = rig({ catalog: [cube("b_cube", v(4, 0, 0)), cube("a_cube", v(-4, 0, 0))] });
  assert.equal(keyOf(tracker.evaluate(origin)), "catalog:a_cube");
});

test("[behavior] tracker: nothing within targetingRadius means no target", () => {
  const { tracker } = rig({ catalog: [cube("far_cube", v(11, 0, 0))] });
  assert.deepEqual(tracker.evaluate(origin), { kind: "unchanged", current: null });
});

test("[behavior] tracker: an occluded nearer object loses to a visible farther one", () => {
  const near = cube("near_cube", v(3, 0, 0));
  const far = cube("far_cube", v(6, 0, 0));
  const cfg = testConfig({ visibilityCacheTTL: 0 });
  const world = new InMemoryWorldStore({ catalog: [near, far] });
  // Every ray aimed at the near cube (x < 4) is blocked.
  const rays = new ScriptedRayCaster((q) => q.target.x < 4);
  const tracker = new TargetTracker("alice", world, new VisibilityChecker(rays, cfg), cfg);

  assert.equal(keyOf(tracker.evaluate(origin)), "catalog:far_cube");
});

test("[behavior] tracker: keeps the target while evaluations repeat", () => {
  const { tracker } = rig({ catalog: [cube("near_cube", v(3, 0, 0))] });

  tracker.evaluate(origin);
  const again = tracker.evaluate(origin);
  assert.equal(again.kind, "unchanged");
  assert.equal(keyOf(again), "catalog:near_cube");
});

test("[behavior] tracker: hysteresis keeps the current target until a challenger is clearly closer", () => {
  const a = makePlaced({ instanceId: "a", id: "a_cube", position: v(5, 0, 0) });
  const { tracker, world } = rig({ placed: [a] });

  assert.equal(keyOf(tracker.evaluate(origin)), "placed:a");

  // 4.6 is not below 5 * (1 - 0.1) = 4.5
  world.cloneNow(makePlaced({ id: "b_cube" }), "alice", v(4.6, 0, 0), "b");
  const held = tracker.evaluate(origin);
  assert.equal(held.kind, "unchanged");
  assert.equal(keyOf(held), "placed:a");

  world.moveNow("b", v(4.4, 0, 0));
  const stolen = tracker.evaluate(origin);
  assert.equal(stolen.kind, "acquired");
  assert.equal(keyOf(stolen), "placed:b");
  assert.equal(stolen.kind === "acquired" ? stolen.previous?.id : null, "a_cube");
});

test("[behavior] tracker: retention extends past the acquisition radius", () => {
  const { tracker } = rig({ catalog: [cube("post", v(9, 0, 0))] });

  assert.equal(tracker.evaluate(origin).kind, "acquired");

  // 11 away: beyond targetingRadius 10, inside retention 12.
  const kept = tracker.evaluate({ position: v(-2, 0, 0) });
  assert.equal(kept.kind, "unchanged");
  assert.equal(keyOf(kept), "catalog:post");

  // 13 away: gone.
  const lost = tracker.evaluate({ position: v(-4, 0, 0) });
  assert.deepEqual(lost.kind === "lost" ? lost.reason : null, "out_of_range");
  assert.equal(tracker.state.currentCandidate, null);
});

test("[behavior] tracker: a removed target is lost as destroyed", () => {
  const { tracker, world } = rig({ placed: [makePlaced({ instanceId: "x", position: v(3, 0, 0) })] });

  tracker.evaluate(origin);
  world.removeNow("x", "destroyed");

  const ev = tracker.evaluate(origin);
  assert.equal(ev.kind, "lost");
  assert.equal(ev.kind === "lost" ? ev.reason : null, "destroyed");
  assert.equal(keyOf(ev), "placed:x");
});

test("[behavior] tracker: a target that becomes occluded is lost as occluded", () => {
  const { tracker, blocked } = rig({ catalog: [cube("near_cube", v(3, 0, 0))] });

  tracker.evaluate(origin);
  blocked.value = true;

  const ev = tracker.evaluate(origin);
  assert.equal(ev.kind === "lost" ? ev.reason : null, "occluded");
  assert.equal(tracker.state.lastVisibilityVerdict?.reason, "occluded");
});

test("[behavior] tracker: a failing candidate source drops the target for one tick only", () => {
  let failing = false;
  const { tracker } = rig({ catalog: [cube("near_cube", v(3, 0, 0))] }, {}, (world) => ({
    enumerateNearby(position: Vec3, radius: number): Iterable<InteractableObject> {
      if (failing) throw new Error("index offline");
      return world.enumerateNearby(position, radius);
    },
  }));

  assert.equal(tracker.evaluate(origin).kind, "acquired");

  failing = true;
  const lost = tracker.evaluate(origin);
  assert.equal(lost.kind === "lost" ? lost.reason : null, "source_unavailable");
  assert.deepEqual(tracker.evaluate(origin), { kind: "unchanged", current: null });

  failing = false;
  const back = tracker.evaluate(origin);
  assert.equal(back.kind, "acquired");
  assert.equal(back.kind === "acquired" ? back.previous : undefined, null);
});

test("[behavior] tracker: a source without contains() reports a vanished target as out_of_range", () => {
  const { tracker, world } = rig(
    { placed: [makePlaced({ instanceId: "x", position: v(3, 0, 0) })] },
    {},
    (w) => ({ enumerateNearby: (p: Vec3, r: number) => w.enumerateNearby(p, r) }),
  );

  tracker.evaluate(origin);
  world.removeNow("x", "recalled");
  const ev = tracker.evaluate(origin);
  assert.equal(ev.kind === "lost" ? ev.reason : null, "out_of_range");
});

test("[behavior] tracker: field of view filters acquisition only", () => {
  const { tracker } = rig(
    { catalog: [cube("ahead", v(5, 0, 0))] },
    { fieldOfViewDeg: 90 },
  );

  assert.deepEqual(tracker.evaluate({ position: v(0, 0, 0), facing: v(-1, 0, 0) }), {
    kind: "unchanged",
    current: null,
  });

  assert.equal(tracker.evaluate({ position: v(0, 0, 0), facing: v(1, 0, 0) }).kind, "acquired");

  // Turning away keeps what is already held.
  const kept = tracker.evaluate({ position: v(0, 0, 0), facing: v(-1, 0, 0) });
  assert.equal(kept.kind, "unchanged");
  assert.equal(keyOf(kept), "catalog:ahead");
});

test("[behavior] tracker: range is measured from the feet while rays leave the eye", () => {
  const rays = new ScriptedRayCaster();
  const cfg = testConfig({ eyeHeight: 1.5, visibilityCacheTTL: 0 });
  const world = new InMemoryWorldStore({ catalog: [cube("edge_cube", v(9.9375, 0, 0))] });
  const tracker = new TargetTracker("alice", world, new VisibilityChecker(rays, cfg), cfg, new ManualClock(0));

  // 9.9375 from the feet; about 10.05 from an eye 1.5 up, past the 10 limit.
  const ev = tracker.evaluate(origin);
  assert.equal(keyOf(ev), "catalog:edge_cube");
  assert.equal(ev.kind, "acquired");
  assert.equal(tracker.state.lastVisibilityVerdict?.distance, 9.9375);
  assert.deepEqual(rays.calls[0]?.origin, v(0, 1.5, 0));
});

test("[behavior] tracker: tick accumulates elapsed time and clear() resets", () => {
  const { tracker, visibility } = rig(
    { catalog: [cube("near_cube", v(3, 0, 0))] },
    { visibilityCacheTTL: 500 },
  );

  tracker.tick(100, origin);
  tracker.tick(100, origin);
  tracker.tick(-5, origin);
  assert.equal(tracker.elapsed, 200);
  assert.equal(visibility.cacheSize, 1);

  tracker.clear();
  assert.equal(tracker.elapsed, 0);
  assert.equal(tracker.state.currentCandidate, null);
  assert.equal(visibility.cacheSize, 0);
});

test("[contract] tracker: withinFieldOfView uses the horizontal angle", () => {
  const o = v(0, 0, 0);
  assert.equal(withinFieldOfView(o, v(1, 0, 0), v(5, 0, 4), 90), true);
  assert.equal(withinFieldOfView(o, v(1, 0, 0), v(5, 0, 6), 90), false);
  assert.equal(withinFieldOfView(o, v(1, 0, 0), v(-5, 0, 0), 360), true);
  assert.equal(withinFieldOfView(o, undefined, v(-5, 0, 0), 90), true);
  // Height is ignored.
  assert.equal(withinFieldOfView(o, v(1, 5, 0), v(5, -20, 0), 60), true);
});
