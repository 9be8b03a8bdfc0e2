// worldcore/test/contract_pricingEngine.test.ts

import test from "node:test";
import assert from "node:assert/strict";

import { PricingEngine, roundHalfUp } from "../pricing/PricingEngine";
import { testConfig } from "./testUtils";

test("[contract] pricing: default multipliers on a base value of 100", () => {
  const pricing = new PricingEngine(testConfig());

  assert.equal(pricing.priceAction("clone", 100), 100);
  assert.equal(pricing.priceAction("recall", 100), 20);
  assert.equal(pricing.priceAction("move", 100), 60);
  assert.equal(pricing.priceAction("destroy", 100), 80);
  assert.equal(pricing.priceAction("rotate", 100), 10);
  assert.equal(pricing.priceAction("examine", 100), 0);
});

test("[contract] pricing: rounds half up at the smallest unit", () => {
  const pricing = new PricingEngine(testConfig());

  // 75 * 0.2 = 15; 73 * 0.2 = 14.6 -> 15; 72 * 0.2 = 14.4 -> 14
  assert.equal(pricing.priceAction("recall", 75), 15);
  assert.equal(pricing.priceAction("recall", 73), 15);
  assert.equal(pricing.priceAction("recall", 72), 14);
  // 25 * 0.1 = 2.5 -> 3
  assert.equal(pricing.priceAction("rotate", 25), 3);
  // 15 * 0.1 = 1.5000000000000002 in floats, 1.5 on paper -> 2 either way
  assert.equal(pricing.priceAction("rotate", 15), 2);
});

test("[contract] pricing: zero base value is free", () => {
  const pricing = new PricingEngine(testConfig());
  assert.equal(pricing.priceAction("clone", 0), 0);
});

test("[contract] pricing: negative or non-finite base value throws RangeError", () => {
  const pricing = new PricingEngine(testConfig());

  assert.throws(() => pricing.priceAction("clone", -1), RangeError);
  assert.throws(() => pricing.priceAction("clone", Number.NaN), RangeError);
  assert.throws(() => pricing.priceAction("clone", Number.POSITIVE_INFINITY), RangeError);
});

test("[contract] pricing: configured multipliers and currency decimals", () => {
  const pricing = new PricingEngine(
    testConfig({ actionMultipliers: { move: 0.333 }, currencyDecimals: 2 }),
  );

  // 10 * 0.333 = 3.33
  assert.equal(pricing.priceAction("move", 10), 3.33);
  // 1.5 * 0.333 = 0.4995 -> 0.50
  assert.equal(pricing.priceAction("move", 1.5), 0.5);
  assert.equal(pricing.multiplierFor("clone"), 1);
});

test("[contract] pricing: roundHalfUp helper", () => {
  assert.equal(roundHalfUp(2.5), 3);
  assert.equal(roundHalfUp(2.49), 2);
  assert.equal(roundHalfUp(1.005, 2), 1.01);
  assert.equal(roundHalfUp(0), 0);
});
