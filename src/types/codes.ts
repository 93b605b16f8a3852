export const ERROR_CODES = [
  "CONTENT_SPAM",
  "CONTENT_INAPPROPRIATE",
  "CONTENT_HARASSMENT",
  "CONTENT_SCAM",
  "CONTENT_VIOLENCE",
  "CONTENT_OTHER",
] as const;

export type ErrorCode = (typeof ERROR_CODES)[number];

/** Short descriptions, in the order the classifier prompt lists them. */
export const ERROR_CODE_DESCRIPTIONS: Record<ErrorCode, string> = {
  CONTENT_SPAM: "for spam messages",
  CONTENT_INAPPROPRIATE: "for inappropriate language or content",
  CONTENT_HARASSMENT: "for harassment or bullying",
  CONTENT_SCAM: "for scam or phishing attempts",
  CONTENT_VIOLENCE: "for violent or threatening content",
  CONTENT_OTHER: "for other malicious content",
};

export function isErrorCode(value: string): value is ErrorCode {
  return (ERROR_CODES as readonly string[]).includes(value);
}
