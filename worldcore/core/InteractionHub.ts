// worldcore/core/InteractionHub.ts
//
// Per-participant interaction runtime on the shard: one TargetTracker and
// one InteractionStateMachine per attached session, wired to the session's
// socket. TickEngine drives tick(); MessageRouter drives the rest.

import { describeRejection, type ActionVerdict } from "../actions/ActionErrors";
import type { ActionValidator } from "../actions/ActionValidator";
import type { FundsLedger } from "../economy/FundsLedger";
import {
  InteractionStateMachine,
  type InteractionState,
  type PromptSink,
} from "../interaction/InteractionStateMachine";
import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import type { ParticipantId } from "../shared/InteractableObject";
import { objectKey } from "../shared/InteractableObject";
import type { Session } from "../shared/Session";
import type { Vec3 } from "../shared/Vec3";
import type {
  ActionInputPayload,
  ActionResultPayload,
  BalancePayload,
  TargetAcquiredPayload,
  TargetLostPayload,
} from "../shared/messages";
import { TargetTracker, type ObserverPose, type TrackerConfig } from "../targeting/TargetTracker";
import { Logger } from "../utils/logger";
import type { VisibilityChecker } from "../visibility/VisibilityChecker";
import type { WorldEventBus } from "../world/WorldEventBus";
import type { CandidateSource } from "../world/WorldIndex";
import type { SessionManager } from "./SessionManager";

const log = Logger.scope("INTERACTION");

/** Where participant bodies go so they can occlude others' rays. */
export interface AvatarRegistry {
  setAvatar(participantId: ParticipantId, position: Vec3 | null): void;
}

export interface InteractionHubDeps {
  sessions: SessionManager;
  candidates: CandidateSource;
  visibility: VisibilityChecker;
  validator: ActionValidator;
  ledger: FundsLedger;
  tracker: TrackerConfig;
  avatars?: AvatarRegistry;
  events?: WorldEventBus;
  clock?: Clock;
}

interface Runtime {
  participantId: ParticipantId;
  tracker: TargetTracker;
  machine: InteractionStateMachine;
}

export class InteractionHub {
  private readonly runtimes = new Map<string, Runtime>();
  private readonly clock: Clock;

  constructor(private readonly deps: InteractionHubDeps) {
    this.clock = deps.clock ?? systemClock;
  }

  attach(session: Session, participantId: ParticipantId): void {
    if (this.runtimes.has(session.id)) this.detach(session.id);

    const tracker = new TargetTracker(
      participantId,
      this.deps.candidates,
      this.deps.visibility,
      this.deps.tracker,
      this.clock,
    );
    const machine = new InteractionStateMachine(
      participantId,
      this.sinkFor(session, participantId),
      (request) => this.deps.validator.validate(request),
      { clock: this.clock },
    );

    this.runtimes.set(session.id, { participantId, tracker, machine });
    this.deps.events?.emit("participant.connected", { participantId });
    log.info("Participant attached", { sessionId: session.id, participantId });
  }

  detach(sessionId: string): void {
    const rt = this.runtimes.get(sessionId);
    if (!rt) return;

    rt.machine.dispose();
    rt.tracker.clear();
    this.deps.avatars?.setAvatar(rt.participantId, null);
    this.runtimes.delete(sessionId);

    this.deps.events?.emit("participant.disconnected", { participantId: rt.participantId });
    log.info("Participant detached", { sessionId, participantId: rt.participantId });
  }

  has(sessionId: string): boolean {
    return this.runtimes.has(sessionId);
  }

  get size(): number {
    return this.runtimes.size;
  }

  updatePose(session: Session, pose: ObserverPose): void {
    session.pose = pose;
    const rt = this.runtimes.get(session.id);
    if (rt) this.deps.avatars?.setAvatar(rt.participantId, pose.position);
  }

  promptShown(sessionId: string): boolean {
    return this.runtimes.get(sessionId)?.machine.markPromptShown() ?? false;
  }

  /** null when the session has no prompt up (nothing was submitted). */
  async submitAction(sessionId: string, input: ActionInputPayload): Promise<ActionVerdict | null> {
    const rt = this.runtimes.get(sessionId);
    if (!rt) return null;
    return rt.machine.requestAction(input.actionType, input.params, input.correlationToken);
  }

  async sendBalance(session: Session): Promise<void> {
    const rt = this.runtimes.get(session.id);
    if (!rt) return;

    try {
      const balance = await this.deps.ledger.getBalance(rt.participantId);
      this.deps.sessions.send<BalancePayload>(session, "balance", { balance });
    } catch (err) {
      log.warn("Balance lookup failed", { sessionId: session.id, err });
      this.deps.sessions.send(session, "error", { code: "balance_unavailable" });
    }
  }

  /** One targeting pass for every attached session with a known pose. */
  tick(deltaMs: number): number {
    let evaluated = 0;

    for (const [sessionId, rt] of this.runtimes) {
      const session = this.deps.sessions.get(sessionId);
      if (!session?.pose) continue;

      try {
        rt.machine.handleEvaluation(rt.tracker.tick(deltaMs, session.pose));
        evaluated++;
      } catch (err) {
        log.warn("Targeting tick failed for session", { sessionId, err });
      }
    }

    return evaluated;
  }

  stateOf(sessionId: string): InteractionState | null {
    return this.runtimes.get(sessionId)?.machine.state ?? null;
  }

  private sinkFor(session: Session, participantId: ParticipantId): PromptSink {
    const sessions = this.deps.sessions;
    const validator = this.deps.validator;

    return {
      targetAcquired: (object) => {
        sessions.send<TargetAcquiredPayload>(session, "target_acquired", {
          targetKey: objectKey(object),
          object,
          actions: validator.availableActions(participantId, object),
        });
      },
      targetLost: (object, reason) => {
        sessions.send<TargetLostPayload>(session, "target_lost", {
          targetKey: objectKey(object),
          reason,
        });
      },
      actionResult: (_request, verdict) => {
        sessions.send<ActionResultPayload>(session, "action_result", {
          verdict,
          message: verdict.status === "rejected" ? describeRejection(verdict) : undefined,
        });
        if (verdict.status === "applied" && verdict.balanceAfter !== null) {
          sessions.send<BalancePayload>(session, "balance", { balance: verdict.balanceAfter });
        }
      },
    };
  }
}
