import { createHmac, timingSafeEqual } from "node:crypto";

import { z } from "zod";

export class AuthError extends Error {
  public readonly code = "unauthorized" as const;
  public readonly reason: "missing_credential" | "invalid_credential" | "expired_credential";

  constructor(reason: AuthError["reason"]) {
    super(`Authentication failed: ${reason}`);
    this.name = "AuthError";
    this.reason = reason;
  }
}

export type VerifyResult = { ok: true; userId: string } | { ok: false; reason: AuthError["reason"] };

/** External identity boundary: turns a pre-issued credential into a user id. */
export interface IdentityVerifier {
  verify(credential: string): Promise<VerifyResult>;
}

const CredentialClaims = z.object({
  sub: z.string().min(1),
  exp: z.number().int().optional(),
});

const sign = (secret: string, body: string) => createHmac("sha256", secret).update(body).digest();

/**
 * Credentials of the form `<base64url(claims)>.<base64url(hmac-sha256)>`,
 * signed by whatever service issues them with the shared secret.
 */
export class HmacCredentialVerifier implements IdentityVerifier {
  private readonly secret: string;
  private readonly now: () => number;

  constructor(secret: string, opts: { now?: () => number } = {}) {
    this.secret = secret;
    this.now = opts.now ?? Date.now;
  }

  async verify(credential: string): Promise<VerifyResult> {
    const [body, signature, ...rest] = credential.trim().split(".");
    if (!body || !signature || rest.length > 0) return { ok: false, reason: "invalid_credential" };

    const expected = sign(this.secret, body);
    const given = Buffer.from(signature, "base64url");
    if (given.length !== expected.length || !timingSafeEqual(given, expected)) {
      return { ok: false, reason: "invalid_credential" };
    }

    let claimsJson: unknown;
    try {
      claimsJson = JSON.parse(Buffer.from(body, "base64url").toString("utf-8"));
    } catch {
      return { ok: false, reason: "invalid_credential" };
    }
    const claims = CredentialClaims.safeParse(claimsJson);
    if (!claims.success) return { ok: false, reason: "invalid_credential" };
    if (claims.data.exp !== undefined && claims.data.exp * 1000 <= this.now()) {
      return { ok: false, reason: "expired_credential" };
    }
    return { ok: true, userId: claims.data.sub };
  }
}

// Used by tests and local tooling; the server itself never issues credentials.
export function signCredential(secret: string, claims: z.input<typeof CredentialClaims>): string {
  const body = Buffer.from(JSON.stringify(claims), "utf-8").toString("base64url");
  return `${body}.${sign(secret, body).toString("base64url")}`;
}

export function readBearer(header: string | string[] | undefined): string | null {
  const value = Array.isArray(header) ? header[0] : header;
  if (typeof value !== "string" || !value.startsWith("Bearer ")) return null;
  const token = value.slice("Bearer ".length).trim();
  return token.length > 0 ? token : null;
}
