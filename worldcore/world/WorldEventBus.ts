// worldcore/world/WorldEventBus.ts
// ------------------------------------------------------------
// Purpose:
// Publish–subscribe bus between the world store, the action
// validator and whatever listens downstream (inventory credit on
// recall, audit, session fan-out).
// ------------------------------------------------------------

import { Logger } from "../utils/logger";
import type { ParticipantId, PlacedObject } from "../shared/InteractableObject";
import type { ActionApplied, ActionRejection } from "../actions/ActionErrors";
import type { ActionRequest } from "../actions/ActionTypes";

const log = Logger.scope("EVENT");

// ------------------------------------------------------------
// Event Types
// ------------------------------------------------------------

export type WorldEventPayloads = {
  "object.placed": { object: PlacedObject; sourceKey: string };
  "object.moved": { object: PlacedObject };
  "object.rotated": { object: PlacedObject };
  "object.destroyed": { object: PlacedObject };
  /** Removed from the world and owed back to the owner's inventory. */
  "object.recalled": { object: PlacedObject; ownerId: ParticipantId };
  "action.applied": { request: ActionRequest; verdict: ActionApplied };
  "action.rejected": { request: ActionRequest; verdict: ActionRejection };
  "participant.connected": { participantId: ParticipantId };
  "participant.disconnected": { participantId: ParticipantId };
};

export type WorldEvent = keyof WorldEventPayloads;

type EventHandler<K extends WorldEvent> = (
  payload: WorldEventPayloads[K],
) => void | Promise<void>;

type HandlerMap = { [K in WorldEvent]?: Set<EventHandler<K>> };

// ------------------------------------------------------------
// WorldEventBus
// ------------------------------------------------------------

export class WorldEventBus {
  private handlers: HandlerMap = {};

  on<K extends WorldEvent>(event: K, handler: EventHandler<K>): void {
    this.setFor(event).add(handler);
    log.debug(`Handler registered for event: ${event}`);
  }

  off<K extends WorldEvent>(event: K, handler: EventHandler<K>): void {
    this.handlers[event]?.delete(handler);
    log.debug(`Handler removed for event: ${event}`);
  }

  /**
   * Fire-and-forget. Async handlers are not awaited; their rejections are
   * logged here so nothing floats.
   */
  emit<K extends WorldEvent>(event: K, payload: WorldEventPayloads[K]): void {
    const set = this.handlers[event];
    if (!set || set.size === 0) return;

    log.debug(`Emitting event: ${event}`);
    for (const handler of set) {
      try {
        const out = handler(payload);
        if (out instanceof Promise) {
          out.catch((err: unknown) => {
            log.error(`Async handler error on event ${event}`, err);
          });
        }
      } catch (err) {
        log.error(`Handler error on event ${event}`, err);
      }
    }
  }

  async emitAsync<K extends WorldEvent>(
    event: K,
    payload: WorldEventPayloads[K],
  ): Promise<void> {
    const set = this.handlers[event];
    if (!set || set.size === 0) return;

    log.debug(`Emitting async event: ${event}`);
    for (const handler of set) {
      try {
        await handler(payload);
      } catch (err) {
        log.error(`Async handler error on event ${event}`, err);
      }
    }
  }

  clear(): void {
    this.handlers = {};
    log.warn("All event handlers cleared from WorldEventBus.");
  }

  private setFor<K extends WorldEvent>(event: K): Set<EventHandler<K>> {
    const existing = this.handlers[event];
    if (existing) return existing;

    const created = new Set<EventHandler<K>>();
    this.handlers[event] = created;
    return created;
  }
}
