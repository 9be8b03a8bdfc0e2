// worldcore/ratelimit/RateLimiter.ts
//
// Per (requester, actionType) sliding-window limits.

import type { ActionType } from "../actions/ActionTypes";
import type { RateLimitRule } from "../config/interactionConfig";
import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import type { ParticipantId } from "../shared/InteractableObject";
import { Logger } from "../utils/logger";
import type { RateLimitDecision, RateLimitStore } from "./RateLimitStore";

const log = Logger.scope("VALIDATOR");

export class RateLimiter {
  constructor(
    private readonly store: RateLimitStore,
    private readonly rules: Record<ActionType, RateLimitRule>,
    private readonly clock: Clock = systemClock,
  ) {}

  consume(requesterId: ParticipantId, actionType: ActionType): RateLimitDecision {
    const rule = this.rules[actionType];
    const decision = this.store.tryConsume(`${requesterId}:${actionType}`, this.clock.now(), rule);

    if (!decision.allowed) {
      log.debug("Rate limited", {
        requesterId,
        actionType,
        used: decision.used,
        retryAfterMs: decision.retryAfterMs,
      });
    }
    return decision;
  }
}
