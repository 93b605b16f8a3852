export {
  ModerationClient,
  createModerationClient,
  DEFAULT_MODEL,
  DEFAULT_BASE_URL,
  CLASSIFIER_TEMPERATURE,
  CLASSIFIER_MAX_TOKENS,
} from "./core/client";
export type { ModerationClientConfig, CheckOptions, CheckResult } from "./core/client";
export { containsBlockedTerm, defaultBlockedTerms, parseBlockedTerms, isWholeWord } from "./core/terms";
export type { TermMatch } from "./core/terms";
export { saveMaliciousMessage, formatTimestamp } from "./core/sink";
export type { VerdictSink } from "./core/sink";
export { isAcceptableMessage, acceptableMessage, acceptableString, NOT_ACCEPTABLE_MESSAGE } from "./core/validator";
export { ModerationError, ClassifierError, ResponseParseError, TokenError } from "./core/errors";
export type { ClassifierErrorCode } from "./core/errors";

export { defaultPromptTemplate } from "./llm/prompt";
export type { PromptTemplate } from "./llm/prompt";
export { stripCodeFence, parseClassifierJson, tryParseClassifierJson, heuristicallyMalicious } from "./llm/json";
export { createOpenAiCompletion } from "./llm/openai";
export type { ChatCompletionFn, CompletionRequest, CompletionResponse } from "./llm/openai";

export { ERROR_CODES, isErrorCode } from "./types/codes";
export type { ErrorCode } from "./types/codes";
export { allowVerdict, rejectVerdict } from "./types/common";
export type { Verdict } from "./types/common";

export { createToken, verifyToken, getTokenExpiration, userIdFromClaims, UserClaimsSchema } from "./auth/jwt";
export type { UserClaims, UserContext, CreateTokenOptions } from "./auth/jwt";
export { optionalJwt, requireJwt, basicAuth } from "./middleware/auth";
export { clientIp, getClientIp } from "./middleware/clientIp";
export { location, resolveLocation } from "./middleware/location";
export type { LocationDefaults } from "./middleware/location";
export { setupMiddlewares } from "./middleware/setup";
export type { MiddlewareOptions } from "./middleware/setup";
export type { RequestLocation } from "./middleware/types";

export { loadConfig } from "./config";
export type { AppConfig } from "./config";
