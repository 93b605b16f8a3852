import type { Express } from "express";

import { optionalJwt } from "./auth";
import { clientIp } from "./clientIp";
import { location } from "./location";

export interface MiddlewareOptions {
  /** Enables optional JWT authentication when non-empty. */
  jwtSecret?: string;
  /** Passed to Express's `trust proxy` setting. Empty trusts nobody. */
  trustedProxies?: string[];
}

/**
 * Install the shared middleware stack: proxy trust, request location, client
 * IP, and (with a secret) optional JWT authentication. Call before mounting
 * routes.
 */
export function setupMiddlewares(app: Express, opts: MiddlewareOptions = {}): Express {
  const proxies = opts.trustedProxies ?? [];
  app.set("trust proxy", proxies.length > 0 ? proxies : false);

  app.use(location());
  app.use(clientIp());

  if (opts.jwtSecret) {
    app.use(optionalJwt(opts.jwtSecret));
  }
  return app;
}
