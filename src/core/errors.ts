/**
 * Base class for errors raised by the moderation library.
 */
export class ModerationError extends Error {
  public readonly code: string;

  constructor(message: string, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ModerationError";
    this.code = code;
  }
}

export type ClassifierErrorCode = "CLASSIFIER_REQUEST_FAILED" | "CLASSIFIER_EMPTY_RESPONSE";

/**
 * The classifier could not be reached or gave nothing back. Returned next to a
 * fail-open verdict so callers can decide the final disposition.
 */
export class ClassifierError extends ModerationError {
  declare readonly code: ClassifierErrorCode;

  constructor(message: string, code: ClassifierErrorCode, cause?: unknown) {
    super(message, code, cause === undefined ? undefined : { cause });
    this.name = "ClassifierError";
  }
}

/**
 * The classifier answered with text that is not the expected JSON object.
 * Only used internally; `checkMessage` falls back to a textual scan instead.
 */
export class ResponseParseError extends ModerationError {
  constructor(message: string, cause?: unknown) {
    super(message, "CLASSIFIER_RESPONSE_INVALID", cause === undefined ? undefined : { cause });
    this.name = "ResponseParseError";
  }
}

export class TokenError extends ModerationError {
  constructor(message: string, cause?: unknown) {
    super(message, "INVALID_TOKEN", cause === undefined ? undefined : { cause });
    this.name = "TokenError";
  }
}
