import jwt, { type Algorithm, type JwtPayload } from "jsonwebtoken";
import { z } from "zod";

import { TokenError } from "../core/errors";

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? "");

const optionalInt = z
  .number()
  .int()
  .nullish()
  .transform((v) => v ?? 0);

/**
 * Claims carried by tokens issued across the ecosystem. `sub` is the user id
 * as a string. Absent or null claims read as "" or 0; only `exp` is required.
 */
export const UserClaimsSchema = z.object({
  iss: optionalString,
  sub: optionalString,
  iat: optionalInt,
  exp: z.number().int(),
  name: optionalString,
  email: optionalString,
  avatar: optionalString,
  about: optionalString,
  about_video: optionalString,
  profile_id: optionalInt.pipe(z.number().nonnegative()),
});

export type UserClaims = z.infer<typeof UserClaimsSchema>;

export interface UserContext {
  id: string;
  name: string;
  email: string;
  avatar: string;
  about: string;
  aboutVideo: string;
  profileId: number;
}

export interface CreateTokenOptions {
  /** Written to `iss`, usually the public URL of the issuing service. */
  issuer: string;
  ttlSeconds: number;
  secret: string;
  /** Extends the lifetime by `refreshTtlSeconds`. */
  refresh?: boolean;
  refreshTtlSeconds?: number;
  now?: Date;
}

const HMAC_ALGORITHMS: Algorithm[] = ["HS256", "HS384", "HS512"];

export function createToken(user: UserContext, opts: CreateTokenOptions): string {
  const iat = Math.floor((opts.now ?? new Date()).getTime() / 1000);
  let exp = iat + opts.ttlSeconds;
  if (opts.refresh) exp += opts.refreshTtlSeconds ?? 0;

  const claims: UserClaims = {
    iss: opts.issuer,
    sub: user.id,
    iat,
    exp,
    name: user.name,
    email: user.email,
    avatar: user.avatar,
    about: user.about,
    about_video: user.aboutVideo,
    profile_id: user.profileId,
  };

  return jwt.sign(claims, opts.secret, { algorithm: "HS256" });
}

/**
 * Verify an HMAC-signed token and return its claims. Expired tokens, tokens
 * issued in the future and tokens of the wrong shape are rejected.
 */
export function verifyToken(token: string, secret: string): UserClaims {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: HMAC_ALGORITHMS });
  } catch (err) {
    if (err instanceof jwt.TokenExpiredError) throw new TokenError("token is expired", err);
    throw new TokenError("invalid token", err);
  }

  const parsed = UserClaimsSchema.safeParse(decoded);
  if (!parsed.success) throw new TokenError("could not parse claims", parsed.error);

  if (parsed.data.iat > Math.floor(Date.now() / 1000)) {
    throw new TokenError("token used before issued");
  }
  return parsed.data;
}

export function getTokenExpiration(token: string, secret: string): number {
  try {
    return verifyToken(token, secret).exp;
  } catch (err) {
    throw new TokenError("invalid token", err);
  }
}

/** Numeric user id from `sub`; 0 unless `sub` is all digits. */
export function userIdFromClaims(claims: UserClaims): number {
  if (!/^\d+$/.test(claims.sub)) return 0;
  const id = Number(claims.sub);
  return Number.isSafeInteger(id) ? id : 0;
}
