// worldcore/interaction/InteractionStateMachine.ts
//
// Client-facing interaction flow for one participant:
//
//   idle -> targeted -> prompt_shown -> action_pending -> applied | rejected
//                                                              |
//                                        targeted (target still there) or idle
//
// There is no terminal state. applied/rejected are observable only while the
// sink's actionResult() runs; the machine settles right after.

import type { ActionVerdict } from "../actions/ActionErrors";
import { ErrorKind, reject } from "../actions/ActionErrors";
import type { ActionParams, ActionRequest, ActionType } from "../actions/ActionTypes";
import { removesTarget } from "../actions/ActionTypes";
import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import type { InteractableObject, ParticipantId } from "../shared/InteractableObject";
import { objectKey } from "../shared/InteractableObject";
import type { TargetEvaluation, TargetLostReason } from "../targeting/TargetTracker";
import { Logger } from "../utils/logger";
import { newCorrelationToken } from "../utils/uuid";

const log = Logger.scope("INTERACTION");

export type InteractionState =
  | "idle"
  | "targeted"
  | "prompt_shown"
  | "action_pending"
  | "applied"
  | "rejected";

export interface PromptSink {
  targetAcquired(object: InteractableObject): void;
  targetLost(object: InteractableObject, reason: TargetLostReason): void;
  actionResult(request: ActionRequest, verdict: ActionVerdict): void;
}

export type SubmitAction = (request: ActionRequest) => Promise<ActionVerdict>;

export interface InteractionStateMachineOptions {
  clock?: Clock;
  newToken?: () => string;
}

export class InteractionStateMachine {
  private current: InteractionState = "idle";
  private target: InteractableObject | null = null;
  private pending: ActionRequest | null = null;
  private disposed = false;

  private readonly clock: Clock;
  private readonly newToken: () => string;

  constructor(
    readonly participantId: ParticipantId,
    private readonly sink: PromptSink,
    private readonly submit: SubmitAction,
    opts: InteractionStateMachineOptions = {},
  ) {
    this.clock = opts.clock ?? systemClock;
    this.newToken = opts.newToken ?? newCorrelationToken;
  }

  get state(): InteractionState {
    return this.current;
  }

  get currentTarget(): InteractableObject | null {
    return this.target;
  }

  get pendingRequest(): ActionRequest | null {
    return this.pending;
  }

  handleEvaluation(evaluation: TargetEvaluation): void {
    if (this.disposed) return;

    switch (evaluation.kind) {
      case "unchanged":
        // Keep the held copy fresh (moved/rotated objects).
        if (evaluation.current && this.target && objectKey(evaluation.current) === objectKey(this.target)) {
          this.target = evaluation.current;
        }
        return;

      case "acquired":
        this.target = evaluation.object;
        if (!this.pending) this.current = "targeted";
        this.sink.targetAcquired(evaluation.object);
        return;

      case "lost": {
        // The machine may already have dropped it (removed by our own action).
        if (!this.target || objectKey(this.target) !== objectKey(evaluation.previous)) return;
        this.target = null;
        this.current = "idle";
        this.sink.targetLost(evaluation.previous, evaluation.reason);
        return;
      }

      default: {
        const _never: never = evaluation;
        return _never;
      }
    }
  }

  /** The UI rendered the prompt for the current target. */
  markPromptShown(): boolean {
    if (this.disposed || this.current !== "targeted" || !this.target) return false;
    this.current = "prompt_shown";
    return true;
  }

  /**
   * Submit an action against the current target. Only valid from
   * prompt_shown; returns null (and submits nothing) otherwise.
   * Pass the previous correlationToken to retry the same request.
   */
  async requestAction(
    actionType: ActionType,
    params?: ActionParams,
    correlationToken?: string,
  ): Promise<ActionVerdict | null> {
    if (this.disposed || this.current !== "prompt_shown" || !this.target || this.pending) {
      log.debug("requestAction ignored", { participantId: this.participantId, state: this.current });
      return null;
    }

    const target = this.target;
    const request: ActionRequest = {
      actionType,
      requesterId: this.participantId,
      submittedAt: this.clock.now(),
      correlationToken: correlationToken ?? this.newToken(),
      ...(target.kind === "placed"
        ? { targetInstanceId: target.instanceId }
        : { targetCatalogId: target.id }),
      ...(params ? { params } : {}),
    };

    this.pending = request;
    this.current = "action_pending";

    let verdict: ActionVerdict;
    try {
      verdict = await this.submit(request);
    } catch (err) {
      log.warn("Action submit failed", { token: request.correlationToken, err });
      verdict = reject(ErrorKind.Unavailable, "submit_failed", request.correlationToken, {
        actionType,
        targetKey: objectKey(target),
      });
    }

    this.settle(request, verdict, objectKey(target));
    return verdict;
  }

  /** Disconnect. Late results are dropped; the server still finishes them. */
  dispose(): void {
    this.disposed = true;
    this.pending = null;
    this.target = null;
    this.current = "idle";
  }

  private settle(request: ActionRequest, verdict: ActionVerdict, targetKey: string): void {
    if (this.disposed) {
      log.debug("Discarding result after dispose", { token: request.correlationToken });
      return;
    }

    this.pending = null;
    this.current = verdict.status;
    this.sink.actionResult(request, verdict);

    const removed = verdict.status === "applied" && removesTarget(request.actionType);
    if (removed && this.target && objectKey(this.target) === targetKey) {
      this.target = null;
    }

    this.current = this.target ? "targeted" : "idle";
  }
}
