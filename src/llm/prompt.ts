import { ERROR_CODES, ERROR_CODE_DESCRIPTIONS } from "../types/codes";

/** Turns a message into the prompt sent to the classifier. */
export type PromptTemplate = (messageText: string) => string;

/**
 * Default moderation prompt. The message is embedded verbatim; the model is
 * asked for a single JSON object with `is_malicious`, `error_code` and
 * `reason`.
 */
export const defaultPromptTemplate: PromptTemplate = (messageText) => {
  const codes = ERROR_CODES.map((code) => `- ${code}: ${ERROR_CODE_DESCRIPTIONS[code]}`);

  return [
    "Analyze the following message and determine if it contains malicious, inappropriate, spam, or harmful content.",
    "",
    `Message: "${messageText}"`,
    "",
    "Respond with ONLY a JSON object in this exact format:",
    "{",
    '  "is_malicious": true or false,',
    '  "error_code": "ERROR_CODE" or null,',
    '  "reason": "brief reason"',
    "}",
    "",
    "Error codes to use if malicious:",
    ...codes,
    "",
    "If the message is safe, set is_malicious to false and error_code to null.",
  ].join("\n");
};
