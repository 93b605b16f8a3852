import { ResponseParseError } from "../core/errors";
import { ClassifierJsonSchema, type ClassifierJson } from "../types/schemas";

/**
 * Remove a markdown code fence around the model output, with or without a
 * `json` language tag.
 */
export function stripCodeFence(text: string): string {
  let out = text.trim();
  if (out.startsWith("```json")) {
    out = out.slice("```json".length);
    if (out.endsWith("```")) out = out.slice(0, -3);
  } else if (out.startsWith("```")) {
    out = out.slice(3);
    if (out.endsWith("```")) out = out.slice(0, -3);
  }
  return out.trim();
}

/** Decode and validate classifier output, throwing ResponseParseError on failure. */
export function parseClassifierJson(text: string): ClassifierJson {
  const body = stripCodeFence(text);

  let obj: unknown;
  try {
    obj = JSON.parse(body);
  } catch (err) {
    const detail = err instanceof Error ? err.message : String(err);
    throw new ResponseParseError(`classifier output is not JSON: ${detail}`, err);
  }

  const parsed = ClassifierJsonSchema.safeParse(obj);
  if (!parsed.success) {
    throw new ResponseParseError(
      `classifier output has unexpected shape: ${parsed.error.issues.map((i) => i.message).join("; ")}`,
      parsed.error,
    );
  }
  return parsed.data;
}

/** Safe parse pipeline from raw model text (or null on failure). */
export function tryParseClassifierJson(text: string): ClassifierJson | null {
  try {
    return parseClassifierJson(text);
  } catch {
    return null;
  }
}

/**
 * Last-resort scan used when the output cannot be decoded: any mention of
 * `is_malicious` together with `true` counts as malicious. This also fires on
 * prose that merely talks about the field, which is accepted.
 */
export function heuristicallyMalicious(text: string): boolean {
  const lower = text.toLowerCase();
  return lower.includes("is_malicious") && lower.includes("true");
}
