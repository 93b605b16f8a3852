import fs from "node:fs";
import { fileURLToPath } from "node:url";

import { logger } from "../util/logger";

export interface TermMatch {
  readonly matched: boolean;
  readonly term: string;
}

const NO_MATCH: TermMatch = Object.freeze({ matched: false, term: "" });

/**
 * Parse a newline-delimited term list. Blank lines and lines starting with
 * `#` are skipped; everything else is trimmed.
 */
export function parseBlockedTerms(source: string): string[] {
  const terms: string[] = [];
  for (const line of source.split("\n")) {
    const trimmed = line.trim();
    if (trimmed !== "" && !trimmed.startsWith("#")) {
      terms.push(trimmed);
    }
  }
  return terms;
}

const BLOCKED_TERMS_FILE = fileURLToPath(new URL("./blocked_terms.txt", import.meta.url));

let defaults: readonly string[] | undefined;

/** Baseline list bundled with the package, read once per process. */
export function defaultBlockedTerms(): readonly string[] {
  if (defaults) return defaults;

  let source = "";
  try {
    source = fs.readFileSync(BLOCKED_TERMS_FILE, "utf8");
  } catch (err) {
    logger.warn({ err, file: BLOCKED_TERMS_FILE }, "blocked terms file could not be read");
  }

  const terms = parseBlockedTerms(source);
  if (terms.length === 0) {
    logger.warn("blocked terms file is empty or missing");
  } else {
    logger.debug({ count: terms.length }, "loaded default blocked terms");
  }
  defaults = Object.freeze(terms);
  return defaults;
}

function isAlphanumeric(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || (ch >= "0" && ch <= "9");
}

/** True when some occurrence of `term` in `message` sits on word boundaries. */
export function isWholeWord(message: string, term: string): boolean {
  let from = 0;
  for (;;) {
    const pos = message.indexOf(term, from);
    if (pos === -1) return false;

    const beforeOk = pos === 0 || !isAlphanumeric(message[pos - 1]);
    const end = pos + term.length;
    const afterOk = end >= message.length || !isAlphanumeric(message[end]);
    if (beforeOk && afterOk) return true;

    from = pos + 1;
  }
}

/**
 * Case-insensitive whole-word search for the first blocked term, in list
 * order. `_` and `-` in the message are also tried as spaces so that
 * `bad_word` and `bad-word` match `bad word`.
 */
export function containsBlockedTerm(messageText: string, blockedTerms: readonly string[]): TermMatch {
  if (blockedTerms.length === 0 || messageText === "") return NO_MATCH;

  const lower = messageText.toLowerCase();
  const normalized = lower.replace(/[_-]/g, " ");

  for (const raw of blockedTerms) {
    const term = raw.trim().toLowerCase();
    if (term === "") continue;

    if (!lower.includes(term) && !normalized.includes(term)) continue;
    if (isWholeWord(lower, term) || isWholeWord(normalized, term)) {
      return { matched: true, term };
    }
  }

  return NO_MATCH;
}
