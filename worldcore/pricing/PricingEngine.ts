// worldcore/pricing/PricingEngine.ts
//
// cost = roundHalfUp(baseValue × multiplier[actionType]) at the smallest
// currency unit. Pure; the validator owns funds checks.

import type { ActionType } from "../actions/ActionTypes";
import type { InteractionConfig } from "../config/interactionConfig";

export type PricingConfig = Pick<InteractionConfig, "actionMultipliers" | "currencyDecimals">;

/**
 * Round half away from zero (costs are never negative, so half-up) at the
 * given number of decimals. The scaled value is nudged by a relative epsilon
 * so 0.15 * 10 style products land on the intended side.
 */
export function roundHalfUp(value: number, decimals = 0): number {
  const factor = 10 ** decimals;
  const scaled = value * factor;
  const nudged = scaled + Math.abs(scaled) * Number.EPSILON * 4;
  return Math.floor(nudged + 0.5) / factor;
}

export class PricingEngine {
  constructor(private readonly cfg: PricingConfig) {}

  multiplierFor(actionType: ActionType): number {
    return this.cfg.actionMultipliers[actionType];
  }

  priceAction(actionType: ActionType, baseValue: number): number {
    if (!Number.isFinite(baseValue) || baseValue < 0) {
      throw new RangeError(`Invalid base value for ${actionType}: ${baseValue}`);
    }

    const multiplier = this.multiplierFor(actionType);
    if (!Number.isFinite(multiplier) || multiplier < 0) {
      throw new RangeError(`Invalid multiplier for ${actionType}: ${multiplier}`);
    }

    return roundHalfUp(baseValue * multiplier, this.cfg.currencyDecimals);
  }
}
