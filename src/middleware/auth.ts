import crypto from "node:crypto";
import type { Request, Response, NextFunction, RequestHandler } from "express";

import { verifyToken, type UserClaims } from "../auth/jwt";
import { logger } from "../util/logger";
import "./types";

/** Token from an `Authorization: <scheme> <token>` header, or null when malformed. */
function bearerToken(header: string): string | null {
  const parts = header.split(" ");
  return parts.length === 2 ? parts[1] : null;
}

function tryVerify(token: string, secret: string): UserClaims | null {
  try {
    return verifyToken(token, secret);
  } catch (err) {
    logger.debug({ err }, "jwt verification failed");
    return null;
  }
}

/**
 * Attach `req.user` when a valid token is sent. Requests without one, or with
 * a bad one, continue anonymously.
 */
export function optionalJwt(secret: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const header = req.header("Authorization");
    if (!header) return next();

    const token = bearerToken(header);
    if (!token) return next();

    const claims = tryVerify(token, secret);
    if (claims) req.user = claims;
    next();
  };
}

/** 401 without a well-formed Authorization header, 403 when the token is invalid. */
export function requireJwt(secret: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const header = req.header("Authorization");
    if (!header) {
      res.sendStatus(401);
      return;
    }

    const token = bearerToken(header);
    if (!token) {
      res.sendStatus(401);
      return;
    }

    const claims = tryVerify(token, secret);
    if (!claims) {
      res.sendStatus(403);
      return;
    }

    req.user = claims;
    next();
  };
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

/** HTTP basic auth for a single account, e.g. in front of API docs. */
export function basicAuth(user: string, password: string, realm = "Authorization Required"): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const match = (req.header("Authorization") ?? "").match(/^Basic\s+(.+)$/i);
    const decoded = match ? Buffer.from(match[1], "base64").toString("utf8") : "";
    const sep = decoded.indexOf(":");

    if (sep >= 0 && safeEqual(decoded.slice(0, sep), user) && safeEqual(decoded.slice(sep + 1), password)) {
      return next();
    }

    res.set("WWW-Authenticate", `Basic realm=${JSON.stringify(realm)}`);
    res.sendStatus(401);
  };
}
