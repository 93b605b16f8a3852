import type { Request, Response, NextFunction, RequestHandler } from "express";

import type { RequestLocation } from "./types";

export interface LocationDefaults {
  scheme?: string;
  host?: string;
}

function firstValue(header: string | undefined): string {
  return (header ?? "").split(",")[0].trim();
}

/**
 * Resolve the scheme and host the client used, preferring the
 * X-Forwarded-Proto and X-Forwarded-Host headers set by proxies.
 */
export function resolveLocation(req: Request, defaults: LocationDefaults = {}): RequestLocation {
  const scheme =
    firstValue(req.header("X-Forwarded-Proto")) || (req.secure ? "https" : "") || defaults.scheme || "http";
  const host =
    firstValue(req.header("X-Forwarded-Host")) || req.header("Host") || defaults.host || "localhost:8080";

  return { scheme, host, base: `${scheme}://${host}` };
}

/** Stores the resolved location on `req.location`. */
export function location(defaults: LocationDefaults = {}): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.location = resolveLocation(req, defaults);
    next();
  };
}
