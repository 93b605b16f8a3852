import net from "node:net";
import type { Request, Response, NextFunction, RequestHandler } from "express";

import "./types";

/**
 * Client address as seen through proxies: the first entry of
 * X-Forwarded-For, then X-Real-IP, then Express's own `req.ip` (which honours
 * the `trust proxy` setting). Header values that are not IP addresses are
 * ignored.
 */
export function getClientIp(req: Request): string {
  const forwardedFor = req.header("X-Forwarded-For");
  if (forwardedFor) {
    const first = forwardedFor.split(",")[0].trim();
    if (net.isIP(first)) return first;
  }

  const realIp = req.header("X-Real-IP");
  if (realIp) {
    const ip = realIp.trim();
    if (net.isIP(ip)) return ip;
  }

  return req.ip ?? req.socket.remoteAddress ?? "";
}

/** Stores the resolved address on `req.clientIp`. */
export function clientIp(): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    req.clientIp = getClientIp(req);
    next();
  };
}
