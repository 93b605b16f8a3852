import { createOpenAiCompletion, type ChatCompletionFn } from "../llm/openai";
import { heuristicallyMalicious, parseClassifierJson } from "../llm/json";
import { defaultPromptTemplate, type PromptTemplate } from "../llm/prompt";
import { isErrorCode } from "../types/codes";
import { allowVerdict, rejectVerdict, type Verdict } from "../types/common";
import type { ClassifierJson } from "../types/schemas";
import { logger as defaultLogger, type Logger } from "../util/logger";
import { ClassifierError, ResponseParseError } from "./errors";
import { containsBlockedTerm, defaultBlockedTerms } from "./terms";

export const DEFAULT_MODEL = "llama-3.1-8b-instant";
export const DEFAULT_BASE_URL = "https://api.groq.com/openai/v1";

/** Sampling settings for the classifier call. */
export const CLASSIFIER_TEMPERATURE = 0.1;
export const CLASSIFIER_MAX_TOKENS = 150;

export interface ModerationClientConfig {
  /** Falls back to GROQ_API_KEY. Without a key the client is inert. */
  apiKey?: string;
  /** Falls back to GROQ_MODEL, then DEFAULT_MODEL. */
  model?: string;
  baseURL?: string;
  promptTemplate?: PromptTemplate;
  /**
   * Terms rejected before the classifier is asked. `undefined` uses the
   * bundled list; an empty array turns the check off.
   */
  blockedTerms?: readonly string[];
  /**
   * Upper bound for one classifier request made through the OpenAI SDK,
   * applied even when the caller passes no signal.
   */
  requestTimeoutMs?: number;
  /** Replaces the OpenAI SDK transport; `requestTimeoutMs` then does not apply. */
  completion?: ChatCompletionFn;
  logger?: Logger;
}

export interface CheckOptions {
  signal?: AbortSignal;
}

export interface CheckResult {
  verdict: Verdict;
  /** Set only when the classifier could not be used; the verdict is then fail-open. */
  error: ClassifierError | null;
}

interface ResolvedSettings {
  model: string;
  promptTemplate: PromptTemplate;
  blockedTerms: readonly string[];
  completion: ChatCompletionFn;
}

/**
 * Two-stage message moderation: blocked terms first, then an LLM classifier.
 *
 * Configuration is fixed at construction and never mutated, so one instance
 * can serve concurrent checks.
 */
export class ModerationClient {
  private readonly settings: ResolvedSettings | null;
  private readonly log: Logger;

  constructor(config: ModerationClientConfig = {}, env: NodeJS.ProcessEnv = process.env) {
    this.log = config.logger ?? defaultLogger;

    const apiKey = config.apiKey || env.GROQ_API_KEY || "";
    if (!apiKey) {
      this.log.warn("GROQ_API_KEY not set, moderation client will allow every message");
      this.settings = null;
      return;
    }

    const model = config.model || env.GROQ_MODEL || DEFAULT_MODEL;
    const baseURL = config.baseURL || env.GROQ_BASE_URL || DEFAULT_BASE_URL;

    this.settings = {
      model,
      promptTemplate: config.promptTemplate ?? defaultPromptTemplate,
      blockedTerms: config.blockedTerms ? Object.freeze([...config.blockedTerms]) : defaultBlockedTerms(),
      completion: config.completion ?? createOpenAiCompletion({ apiKey, baseURL, timeoutMs: config.requestTimeoutMs }),
    };

    this.log.info({ model, blockedTerms: this.settings.blockedTerms.length }, "moderation client initialized");
  }

  /** Logger given at construction, or the package logger. */
  get logger(): Logger {
    return this.log;
  }

  get isConfigured(): boolean {
    return this.settings !== null;
  }

  get model(): string {
    return this.settings?.model ?? DEFAULT_MODEL;
  }

  get blockedTerms(): readonly string[] {
    return this.settings?.blockedTerms ?? [];
  }

  /**
   * Classify a message.
   *
   * Only transport failures and empty responses are reported through
   * `error`; undecodable model output is logged and resolved heuristically.
   */
  async checkMessage(messageText: string, opts: CheckOptions = {}): Promise<CheckResult> {
    const settings = this.settings;
    if (!settings) {
      this.log.warn("moderation client not initialized, allowing message");
      return { verdict: allowVerdict(), error: null };
    }

    const hit = containsBlockedTerm(messageText, settings.blockedTerms);
    if (hit.matched) {
      this.log.info({ term: hit.term }, "message rejected by blocked term");
      return { verdict: rejectVerdict("CONTENT_INAPPROPRIATE"), error: null };
    }

    let choices: string[];
    try {
      const response = await settings.completion(
        {
          model: settings.model,
          prompt: settings.promptTemplate(messageText),
          temperature: CLASSIFIER_TEMPERATURE,
          maxTokens: CLASSIFIER_MAX_TOKENS,
        },
        opts.signal,
      );
      choices = response.choices;
    } catch (err) {
      const detail = err instanceof Error ? err.message : String(err);
      this.log.error({ err }, "classifier request failed");
      return {
        verdict: allowVerdict(),
        error: new ClassifierError(`error calling classifier: ${detail}`, "CLASSIFIER_REQUEST_FAILED", err),
      };
    }

    if (choices.length === 0) {
      this.log.error("classifier returned no choices");
      return {
        verdict: allowVerdict(),
        error: new ClassifierError("no response from classifier", "CLASSIFIER_EMPTY_RESPONSE"),
      };
    }

    const text = choices[0];
    this.log.debug({ response: text }, "classifier response");
    return { verdict: this.toVerdict(text), error: null };
  }

  /** Older name of checkMessage. */
  filterMessage(messageText: string, opts: CheckOptions = {}): Promise<CheckResult> {
    return this.checkMessage(messageText, opts);
  }

  private toVerdict(text: string): Verdict {
    let parsed: ClassifierJson;
    try {
      parsed = parseClassifierJson(text);
    } catch (err) {
      if (!(err instanceof ResponseParseError)) throw err;
      this.log.warn({ err: err.message }, "could not parse classifier response");
      return heuristicallyMalicious(text) ? rejectVerdict("CONTENT_OTHER") : allowVerdict();
    }

    if (!parsed.is_malicious) return allowVerdict();

    const code = parsed.error_code ?? "";
    const errorCode = isErrorCode(code) ? code : "CONTENT_OTHER";
    const reason = parsed.reason ?? "";
    this.log.info({ errorCode, reason }, "message flagged as malicious");
    return rejectVerdict(errorCode, reason);
  }
}

export function createModerationClient(
  config: ModerationClientConfig = {},
  env: NodeJS.ProcessEnv = process.env,
): ModerationClient {
  return new ModerationClient(config, env);
}
