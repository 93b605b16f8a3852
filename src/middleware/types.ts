import type { UserClaims } from "../auth/jwt";

export interface RequestLocation {
  scheme: string;
  host: string;
  /** `scheme://host` */
  base: string;
}

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: UserClaims;
      clientIp?: string;
      location?: RequestLocation;
    }
  }
}
