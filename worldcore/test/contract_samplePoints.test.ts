// worldcore/test/contract_samplePoints.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import {
  MAX_SAMPLES,
  MIN_SAMPLES,
  generateSamplePoints,
  sampleCountFor,
} from "../visibility/SamplePoints";
import { v } from "./testUtils";

test("[contract] sample points: ray count scales with object size", () => {
  assert.equal(sampleCountFor(v(0.5, 0.5, 0.5), 8), MIN_SAMPLES);
  assert.equal(sampleCountFor(v(1.5, 0.2, 0.2), 8), 6);
  assert.equal(sampleCountFor(v(3, 1, 1), 8), 8);
});

test("[contract] sample points: configured count is clamped to [MIN, MAX]", () => {
  assert.equal(sampleCountFor(v(3, 3, 3), 2), MIN_SAMPLES);
  assert.equal(sampleCountFor(v(3, 3, 3), 100), MAX_SAMPLES);
  // Mid-size objects never exceed the configured cap.
  assert.equal(sampleCountFor(v(1.5, 1.5, 1.5), 5), 5);
});

test("[contract] sample points: center first, then opposite corners, inset into the box", () => {
  const pts = generateSamplePoints(v(0, 0, 0), v(2, 2, 2), 4);

  assert.deepEqual(pts, [
    v(0, 0, 0),
    v(-0.9, -0.9, -0.9),
    v(0.9, 0.9, 0.9),
    v(0.9, -0.9, -0.9),
  ]);
});

test("[contract] sample points: every point lies inside the bounding box", () => {
  const center = v(10, 2, -4);
  const size = v(4, 2, 6);
  const pts = generateSamplePoints(center, size, MAX_SAMPLES);

  assert.equal(pts.length, MAX_SAMPLES);
  for (const p of pts) {
    assert.ok(Math.abs(p.x - center.x) < size.x / 2);
    assert.ok(Math.abs(p.y - center.y) < size.y / 2);
    assert.ok(Math.abs(p.z - center.z) < size.z / 2);
  }
});

test("[contract] sample points: requested count below the minimum still yields MIN_SAMPLES", () => {
  assert.equal(generateSamplePoints(v(0, 0, 0), v(1, 1, 1), 1).length, MIN_SAMPLES);
});
