//worldcore/core/SessionManager.ts

import type { Session, SessionSocket } from "../shared/Session";
import type { ServerMessage, ServerOpcode } from "../shared/messages";
import type { ParticipantId } from "../shared/InteractableObject";
import type { Clock } from "../shared/Clock";
import { systemClock } from "../shared/Clock";
import { Logger } from "../utils/logger";

const log = Logger.scope("SESSIONS");

let SESSION_COUNTER = 0;

export class SessionManager {
  private sessions = new Map<string, Session>();

  constructor(private readonly clock: Clock = systemClock) {}

  // ---------------------------------------------------------------------------
  // Creation / lookup
  // ---------------------------------------------------------------------------

  /**
   * Create and register a new session bound to a socket.
   *
   * NOTE:
   *  - displayName is just a label; identity is attached by hello.
   */
  createSession(socket: SessionSocket, displayName: string): Session {
    const id = this.nextId();

    const session: Session = {
      id,
      displayName,
      socket,
      lastSeen: this.clock.now(),
    };

    this.sessions.set(id, session);

    log.info("Session created", {
      sessionId: id,
      displayName,
    });

    return session;
  }

  get(id: string): Session | undefined {
    return this.sessions.get(id);
  }

  getAllSessions(): Iterable<Session> {
    return this.sessions.values();
  }

  findByParticipant(participantId: ParticipantId): Session | undefined {
    for (const s of this.sessions.values()) {
      if (s.identity?.participantId === participantId) return s;
    }
    return undefined;
  }

  count(): number {
    return this.sessions.size;
  }

  // ---------------------------------------------------------------------------
  // Activity / idle tracking
  // ---------------------------------------------------------------------------

  /** Called by MessageRouter whenever a message is received. */
  touch(sessionId: string): void {
    const s = this.sessions.get(sessionId);
    if (!s) return;
    s.lastSeen = this.clock.now();
  }

  // ---------------------------------------------------------------------------
  // Sending messages
  // ---------------------------------------------------------------------------

  send<P>(session: Session, op: ServerOpcode, payload?: P): void {
    const msg: ServerMessage<P> = {
      op,
      payload,
    };

    try {
      session.socket.send(JSON.stringify(msg));
    } catch (err) {
      log.warn("Failed to send message to session", {
        sessionId: session.id,
        op,
        err,
      });
    }
  }

  // ---------------------------------------------------------------------------
  // Removal / cleanup
  // ---------------------------------------------------------------------------

  /**
   * Remove a session and close its socket. Returns the removed session so
   * callers can tear down per-participant state.
   */
  removeSession(id: string): Session | undefined {
    const session = this.sessions.get(id);
    if (!session) {
      return undefined;
    }

    try {
      session.socket.close(1000, "session_removed");
    } catch (err) {
      log.warn("Error closing socket for session", {
        sessionId: id,
        err,
      });
    }

    this.sessions.delete(id);

    log.info("Session removed", { sessionId: id });
    return session;
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private nextId(): string {
    SESSION_COUNTER++;
    return `S${Date.now().toString(36)}${SESSION_COUNTER.toString(36)}`;
  }
}
