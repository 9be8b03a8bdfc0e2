// worldcore/shared/AuthTypes.ts
//
// Identity model shared by the shard host and whatever issues tokens.
// Pure types; signing and verification live in worldcore/auth/.

import type { ParticipantId } from "./InteractableObject";

// Claims carried in a signed session token.
export interface AuthTokenPayload {
  sub: ParticipantId; // subject (participant id)
  displayName: string;

  // Issued-at and expiry timestamps (seconds since epoch).
  iat?: number;
  exp?: number;
}

// How the shard sees an attached session.
export interface AttachedIdentity {
  participantId: ParticipantId;
  displayName: string;
  /** false for guests admitted while auth is optional. */
  verified: boolean;
}
