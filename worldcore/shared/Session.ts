//worldcore/shared/Session.ts

import type { AttachedIdentity } from "./AuthTypes";
import type { Vec3 } from "./Vec3";

/** The part of a ws WebSocket a session uses. */
export interface SessionSocket {
  send(data: string): void;
  close(code?: number, reason?: string): void;
}

export interface Session {
  id: string;
  displayName: string;
  socket: SessionSocket;
  lastSeen: number;
  /** Set by hello; nothing in-world happens before it. */
  identity?: AttachedIdentity;
  /** Latest client pose; the tick loop reads it. */
  pose?: { position: Vec3; facing?: Vec3 };
}
