// worldcore/auth/TokenVerifier.ts

import jwt from "jsonwebtoken";
import { Logger } from "../utils/logger";
import type { AttachedIdentity, AuthTokenPayload } from "../shared/AuthTypes";

const log = Logger.scope("AUTH");

const DEFAULT_LIFETIME_SECONDS = 60 * 60 * 24;

/**
 * HS256 session tokens. The shard only verifies; signToken exists for the
 * dev token tool and tests.
 */
export class TokenVerifier {
  constructor(
    private readonly secret: string,
    private readonly lifetimeSeconds = DEFAULT_LIFETIME_SECONDS,
  ) {}

  signToken(participantId: string, displayName: string): string {
    const payload: AuthTokenPayload = { sub: participantId, displayName };
    return jwt.sign(payload, this.secret, { expiresIn: this.lifetimeSeconds });
  }

  verifyToken(token: string): AttachedIdentity | null {
    try {
      const decoded = jwt.verify(token, this.secret);
      if (typeof decoded === "string" || typeof decoded.sub !== "string" || !decoded.sub) {
        log.warn("Token has no subject");
        return null;
      }

      const name = decoded["displayName"];
      return {
        participantId: decoded.sub,
        displayName: typeof name === "string" && name ? name : decoded.sub,
        verified: true,
      };
    } catch (err) {
      log.warn("Token verification failed", { err: String(err) });
      return null;
    }
  }
}
