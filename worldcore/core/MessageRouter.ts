//worldcore/core/MessageRouter.ts

import { isActionType, type ActionParams } from "../actions/ActionTypes";
import type { TokenVerifier } from "../auth/TokenVerifier";
import type { AttachedIdentity } from "../shared/AuthTypes";
import type { Session } from "../shared/Session";
import { isFiniteVec3 } from "../shared/Vec3";
import type {
  ActionInputPayload,
  ClientMessage,
  ClientOpcode,
  HelloPayload,
  PosePayload,
} from "../shared/messages";
import { isRecord } from "../utils/guards";
import { Logger } from "../utils/logger";
import type { InteractionHub } from "./InteractionHub";
import type { SessionManager } from "./SessionManager";

const log = Logger.scope("ROUTER");

const CLIENT_OPCODES: readonly ClientOpcode[] = [
  "hello",
  "ping",
  "pose",
  "prompt_shown",
  "action_input",
  "balance_request",
];

export interface RouterOptions {
  /** Admit sessions without a valid token as guests. */
  authOptional: boolean;
}

// ---------------------------------------------------------------------------
// Payload parsing. Everything off the wire is unknown until checked here.
// ---------------------------------------------------------------------------

export function parseClientMessage(raw: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed)) return null;

  const wanted = parsed.op;
  const op = CLIENT_OPCODES.find((o) => o === wanted);
  if (!op) return null;
  return { op, payload: parsed.payload };
}

export function parseHello(payload: unknown): HelloPayload {
  if (!isRecord(payload)) return {};
  const { token, displayName } = payload;
  return {
    token: typeof token === "string" && token ? token : undefined,
    displayName: typeof displayName === "string" && displayName ? displayName.slice(0, 32) : undefined,
  };
}

export function parsePose(payload: unknown): PosePayload | null {
  if (!isRecord(payload)) return null;
  const { position, facing } = payload;
  if (!isFiniteVec3(position)) return null;
  if (facing === undefined) return { position };
  return isFiniteVec3(facing) ? { position, facing } : null;
}

function parseParams(raw: unknown): ActionParams | null {
  if (!isRecord(raw)) return null;
  const out: ActionParams = {};

  if (raw.position !== undefined) {
    if (!isFiniteVec3(raw.position)) return null;
    out.position = raw.position;
  }
  if (raw.rotationY !== undefined) {
    if (typeof raw.rotationY !== "number" || !Number.isFinite(raw.rotationY)) return null;
    out.rotationY = raw.rotationY;
  }
  return out;
}

export function parseActionInput(payload: unknown): ActionInputPayload | null {
  if (!isRecord(payload) || !isActionType(payload.actionType)) return null;
  const input: ActionInputPayload = { actionType: payload.actionType };

  if (payload.correlationToken !== undefined) {
    if (typeof payload.correlationToken !== "string" || !payload.correlationToken) return null;
    input.correlationToken = payload.correlationToken;
  }
  if (payload.params !== undefined) {
    const params = parseParams(payload.params);
    if (!params) return null;
    input.params = params;
  }
  return input;
}

function rawToString(data: unknown): string | null {
  if (typeof data === "string") return data;
  if (Buffer.isBuffer(data)) return data.toString("utf8");
  if (Array.isArray(data) && data.every((d) => Buffer.isBuffer(d))) {
    return Buffer.concat(data).toString("utf8");
  }
  return null;
}

// ---------------------------------------------------------------------------

export class MessageRouter {
  constructor(
    private readonly sessions: SessionManager,
    private readonly hub: InteractionHub,
    private readonly verifier: TokenVerifier | null,
    private readonly opts: RouterOptions,
  ) {}

  async handleRawMessage(session: Session, data: unknown): Promise<void> {
    const raw = rawToString(data);
    const msg = raw === null ? null : parseClientMessage(raw);

    if (!msg) {
      log.warn("Bad client message", {
        sessionId: session.id,
        preview: raw?.slice(0, 256) ?? typeof data,
      });
      this.sessions.send(session, "error", { code: "bad_message_shape" });
      return;
    }

    // Mark activity for heartbeat
    this.sessions.touch(session.id);

    log.debug("Routing message", { sessionId: session.id, op: msg.op });

    try {
      await this.route(session, msg);
    } catch (err) {
      log.error("Handler failed", { sessionId: session.id, op: msg.op, err });
      this.sessions.send(session, "error", { code: "internal_error", op: msg.op });
    }
  }

  /** Attach an identity and start the session's interaction runtime. */
  attachIdentity(session: Session, identity: AttachedIdentity): void {
    session.identity = identity;
    session.displayName = identity.displayName;
    this.hub.attach(session, identity.participantId);

    this.sessions.send(session, "welcome", {
      sessionId: session.id,
      participantId: identity.participantId,
      displayName: identity.displayName,
      verified: identity.verified,
    });
  }

  private async route(session: Session, msg: ClientMessage): Promise<void> {
    switch (msg.op) {
      case "ping": {
        this.sessions.send(session, "pong", { t: Date.now() });
        return;
      }

      case "hello": {
        await this.handleHello(session, parseHello(msg.payload));
        return;
      }

      case "pose":
      case "prompt_shown":
      case "action_input":
      case "balance_request": {
        if (!session.identity || !this.hub.has(session.id)) {
          this.sessions.send(session, "error", { code: "not_attached", op: msg.op });
          return;
        }
        await this.routeInWorld(session, msg);
        return;
      }

      default: {
        const _never: never = msg.op;
        return _never;
      }
    }
  }

  private async routeInWorld(session: Session, msg: ClientMessage): Promise<void> {
    switch (msg.op) {
      case "pose": {
        const pose = parsePose(msg.payload);
        if (!pose) {
          this.sessions.send(session, "error", { code: "bad_pose" });
          return;
        }
        this.hub.updatePose(session, pose);
        return;
      }

      case "prompt_shown": {
        if (!this.hub.promptShown(session.id)) {
          this.sessions.send(session, "error", { code: "no_target" });
        }
        return;
      }

      case "action_input": {
        const input = parseActionInput(msg.payload);
        if (!input) {
          this.sessions.send(session, "error", { code: "bad_action_input" });
          return;
        }
        const verdict = await this.hub.submitAction(session.id, input);
        if (!verdict) this.sessions.send(session, "error", { code: "no_prompt" });
        return;
      }

      case "balance_request": {
        await this.hub.sendBalance(session);
        return;
      }

      case "hello":
      case "ping":
        return;

      default: {
        const _never: never = msg.op;
        return _never;
      }
    }
  }

  private async handleHello(session: Session, hello: HelloPayload): Promise<void> {
    if (session.identity) {
      this.sessions.send(session, "error", { code: "already_attached" });
      return;
    }

    const verified = hello.token && this.verifier ? this.verifier.verifyToken(hello.token) : null;

    if (verified) {
      this.attachIdentity(session, verified);
    } else if (this.opts.authOptional) {
      log.info("Guest session (auth optional)", { sessionId: session.id });
      this.attachIdentity(session, {
        participantId: `guest_${session.id}`,
        displayName: hello.displayName ?? session.displayName,
        verified: false,
      });
    } else {
      this.sessions.send(session, "error", { code: "auth_required" });
      return;
    }

    await this.hub.sendBalance(session);
  }
}
