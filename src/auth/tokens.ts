// src/auth/tokens.ts
import crypto from "crypto";
import { z } from "zod";

export type SessionPayload = {
  sub: number; // user id
  iat: number;
  exp: number;
};

const payloadSchema = z.object({
  sub: z.number().int().positive(),
  iat: z.number().int(),
  exp: z.number().int(),
});

const DAY_SECONDS = 24 * 60 * 60;

export interface SessionTokenOptions {
  secret: string;
  ttlDays: number;
  now?: () => number; // epoch ms
}

/**
 * Opaque bearer credentials: `base64url(json).base64url(hmac-sha256)`.
 */
export class SessionTokens {
  private readonly secret: string;
  private readonly ttlSeconds: number;
  private readonly now: () => number;

  constructor(options: SessionTokenOptions) {
    this.secret = options.secret;
    this.ttlSeconds = Math.round(options.ttlDays * DAY_SECONDS);
    this.now = options.now ?? Date.now;
  }

  issue(userId: number): string {
    const iat = Math.floor(this.now() / 1000);
    const payload: SessionPayload = { sub: userId, iat, exp: iat + this.ttlSeconds };
    const bodyB64 = Buffer.from(JSON.stringify(payload), "utf8").toString("base64url");
    return `${bodyB64}.${this.sign(bodyB64)}`;
  }

  verify(token: string): SessionPayload | null {
    const parts = token.split(".");
    if (parts.length !== 2) return null;

    const [bodyB64, sigB64] = parts;

    // constant-time compare
    const a = Buffer.from(sigB64);
    const b = Buffer.from(this.sign(bodyB64));
    if (a.length !== b.length || !crypto.timingSafeEqual(a, b)) return null;

    let decoded: unknown;
    try {
      decoded = JSON.parse(Buffer.from(bodyB64, "base64url").toString("utf8"));
    } catch {
      return null;
    }

    const parsed = payloadSchema.safeParse(decoded);
    if (!parsed.success) return null;

    const now = Math.floor(this.now() / 1000);
    if (parsed.data.exp <= now) return null;

    return parsed.data;
  }

  private sign(bodyB64: string): string {
    return crypto.createHmac("sha256", this.secret).update(bodyB64).digest("base64url");
  }
}
