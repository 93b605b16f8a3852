import type { ErrorCode } from "./codes";

/**
 * Outcome of a single moderation check.
 *
 * When `isMalicious` is false both `errorCode` and `reason` are empty strings.
 */
export type Verdict =
  | { isMalicious: false; errorCode: ""; reason: "" }
  | { isMalicious: true; errorCode: ErrorCode; reason: string };

export function allowVerdict(): Verdict {
  return { isMalicious: false, errorCode: "", reason: "" };
}

export function rejectVerdict(errorCode: ErrorCode, reason = ""): Verdict {
  return { isMalicious: true, errorCode, reason };
}
