import { z } from "zod";

import type { ModerationClient } from "./client";

/**
 * Fail-closed acceptability check for form fields. Empty text passes so that
 * optional fields stay optional; a classifier error rejects the value.
 */
export async function isAcceptableMessage(
  client: ModerationClient,
  text: string,
  signal?: AbortSignal,
): Promise<boolean> {
  if (text === "") return true;

  const { verdict, error } = await client.checkMessage(text, { signal });
  if (error) {
    client.logger.error({ err: error }, "error validating message with classifier");
    return false;
  }
  return !verdict.isMalicious;
}

/** Refinement callback for `z.string().refine(...)`. */
export function acceptableMessage(client: ModerationClient): (text: string) => Promise<boolean> {
  return (text) => isAcceptableMessage(client, text);
}

export const NOT_ACCEPTABLE_MESSAGE = "message is not acceptable";

/** String schema that only accepts acceptable messages. Parse it with parseAsync. */
export function acceptableString(client: ModerationClient) {
  return z.string().refine(acceptableMessage(client), { message: NOT_ACCEPTABLE_MESSAGE });
}
