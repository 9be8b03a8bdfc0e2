//worldcore/shared/messages.ts

import type { ActionVerdict } from "../actions/ActionErrors";
import type { ActionParams, ActionType, AvailableAction } from "../actions/ActionTypes";
import type { InteractableObject } from "./InteractableObject";
import type { Vec3 } from "./Vec3";

// -------------------------
// Opcodes
// -------------------------

export type ClientOpcode =
  | "hello"
  | "ping"
  | "pose"
  | "prompt_shown"
  | "action_input"
  | "balance_request";

export type ServerOpcode =
  | "welcome"
  | "error"
  | "pong"
  | "target_acquired"
  | "target_lost"
  | "action_result"
  | "balance";

// -------------------------
// Envelope types
// -------------------------

export interface ClientMessage {
  op: ClientOpcode;
  payload?: unknown;
}

export interface ServerMessage<P = unknown> {
  op: ServerOpcode;
  payload?: P;
}

// -------------------------
// Payloads
// -------------------------

export interface HelloPayload {
  /** Signed session token; optional only when the shard allows guests. */
  token?: string;
  displayName?: string;
}

export interface PosePayload {
  position: Vec3;
  facing?: Vec3;
}

export interface ActionInputPayload {
  actionType: ActionType;
  /** Reuse the token of an earlier attempt to retry it. */
  correlationToken?: string;
  params?: ActionParams;
}

export interface TargetAcquiredPayload {
  targetKey: string;
  object: InteractableObject;
  /** What this participant may do to the target, with current prices. */
  actions: AvailableAction[];
}

export interface TargetLostPayload {
  targetKey: string;
  reason: string;
}

export interface ActionResultPayload {
  verdict: ActionVerdict;
  /** Participant-facing text for rejections. */
  message?: string;
}

export interface BalancePayload {
  balance: number;
}
