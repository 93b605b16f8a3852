import { describe, it, expect } from "vitest";
import { ModerationClient, CLASSIFIER_MAX_TOKENS, CLASSIFIER_TEMPERATURE, DEFAULT_MODEL } from "../src/core/client";
import { ClassifierError } from "../src/core/errors";
import { defaultBlockedTerms } from "../src/core/terms";
import type { CompletionResponse } from "../src/llm/openai";
import { defaultPromptTemplate } from "../src/llm/prompt";
import { capturingLogger, makeClient, silentLogger, stubCompletion } from "./helpers/stubs";

const SAFE = '{"is_malicious": false, "error_code": null, "reason": ""}';

describe("ModerationClient.checkMessage", () => {
  it("rejects blocked terms without calling the classifier", async () => {
    const stub = stubCompletion([SAFE]);
    const client = makeClient(stub, ["spam"]);

    const res = await client.checkMessage("This is SPAM!!");

    expect(res).toEqual({
      verdict: { isMalicious: true, errorCode: "CONTENT_INAPPROPRIATE", reason: "" },
      error: null,
    });
    expect(stub.calls).toHaveLength(0);
  });

  it("allows a message the classifier calls safe", async () => {
    const stub = stubCompletion([SAFE]);
    const res = await makeClient(stub).checkMessage("hello there");
    expect(res).toEqual({ verdict: { isMalicious: false, errorCode: "", reason: "" }, error: null });
    expect(stub.calls).toHaveLength(1);
  });

  it("reproduces code and reason from the classifier", async () => {
    const reply = JSON.stringify({ is_malicious: true, error_code: "CONTENT_SCAM", reason: "phishing link" });
    const res = await makeClient(stubCompletion([reply])).checkMessage("click this");
    expect(res.verdict).toEqual({ isMalicious: true, errorCode: "CONTENT_SCAM", reason: "phishing link" });
    expect(res.error).toBeNull();
  });

  it("parses fenced replies the same as bare JSON", async () => {
    const reply = '{"is_malicious": true, "error_code": "CONTENT_SPAM", "reason": "ads"}';
    const expected = { isMalicious: true, errorCode: "CONTENT_SPAM", reason: "ads" };

    for (const text of [reply, "```json\n" + reply + "\n```", "```\n" + reply + "\n```"]) {
      const res = await makeClient(stubCompletion([text])).checkMessage("buy now");
      expect(res.verdict).toEqual(expected);
    }
  });

  it("defaults a missing error code to CONTENT_OTHER", async () => {
    const reply = '{"is_malicious": true, "error_code": null, "reason": "rude"}';
    const res = await makeClient(stubCompletion([reply])).checkMessage("x");
    expect(res.verdict).toEqual({ isMalicious: true, errorCode: "CONTENT_OTHER", reason: "rude" });
  });

  it("maps unknown error codes to CONTENT_OTHER", async () => {
    const reply = '{"is_malicious": true, "error_code": "CONTENT_WEIRD", "reason": "odd"}';
    const res = await makeClient(stubCompletion([reply])).checkMessage("x");
    expect(res.verdict).toEqual({ isMalicious: true, errorCode: "CONTENT_OTHER", reason: "odd" });
  });

  it("drops code and reason when the classifier says not malicious", async () => {
    const reply = '{"is_malicious": false, "error_code": "CONTENT_SPAM", "reason": "borderline"}';
    const res = await makeClient(stubCompletion([reply])).checkMessage("x");
    expect(res.verdict).toEqual({ isMalicious: false, errorCode: "", reason: "" });
  });

  it("reads a null is_malicious as not malicious", async () => {
    const reply = '{"is_malicious": null, "error_code": null, "reason": "nothing here is true abuse"}';
    const res = await makeClient(stubCompletion([reply])).checkMessage("x");
    expect(res).toEqual({ verdict: { isMalicious: false, errorCode: "", reason: "" }, error: null });
  });

  it("falls back to a text scan when the reply is not JSON", async () => {
    const res = await makeClient(stubCompletion(["is_malicious: true, because of threats"])).checkMessage("x");
    expect(res).toEqual({
      verdict: { isMalicious: true, errorCode: "CONTENT_OTHER", reason: "" },
      error: null,
    });
  });

  it("fails open without an error when the reply is unreadable", async () => {
    const res = await makeClient(stubCompletion(["I cannot classify this."])).checkMessage("x");
    expect(res).toEqual({ verdict: { isMalicious: false, errorCode: "", reason: "" }, error: null });
  });

  it("fails open with an error when the request fails", async () => {
    const res = await makeClient(stubCompletion(new Error("connection refused"))).checkMessage("x");

    expect(res.verdict).toEqual({ isMalicious: false, errorCode: "", reason: "" });
    expect(res.error).toBeInstanceOf(ClassifierError);
    expect(res.error?.code).toBe("CLASSIFIER_REQUEST_FAILED");
    expect(res.error?.message).toBe("error calling classifier: connection refused");
  });

  it("treats an empty choice list as a failure", async () => {
    const res = await makeClient(stubCompletion([])).checkMessage("x");
    expect(res.verdict.isMalicious).toBe(false);
    expect(res.error?.code).toBe("CLASSIFIER_EMPTY_RESPONSE");
    expect(res.error?.message).toBe("no response from classifier");
  });

  it("sends one low-temperature, length-bounded request", async () => {
    const stub = stubCompletion([SAFE]);
    await makeClient(stub).checkMessage("hello");

    expect(stub.calls).toEqual([
      {
        model: "test-model",
        prompt: defaultPromptTemplate("hello"),
        temperature: CLASSIFIER_TEMPERATURE,
        maxTokens: CLASSIFIER_MAX_TOKENS,
      },
    ]);
    expect(CLASSIFIER_TEMPERATURE).toBe(0.1);
    expect(CLASSIFIER_MAX_TOKENS).toBe(150);
  });

  it("uses a custom prompt template", async () => {
    const stub = stubCompletion([SAFE]);
    const client = new ModerationClient(
      {
        apiKey: "test-key",
        completion: stub.fn,
        blockedTerms: [],
        promptTemplate: (text) => `classify: ${text}`,
        logger: silentLogger,
      },
      {},
    );
    await client.checkMessage("hello");
    expect(stub.calls[0].prompt).toBe("classify: hello");
  });

  it("hands the caller's signal to the transport", async () => {
    const stub = stubCompletion([SAFE]);
    const controller = new AbortController();
    await makeClient(stub).checkMessage("hello", { signal: controller.signal });
    expect(stub.signals[0]).toBe(controller.signal);
  });

  it("reports an aborted request as a classifier error", async () => {
    const client = new ModerationClient(
      {
        apiKey: "test-key",
        blockedTerms: [],
        logger: silentLogger,
        completion: (_req, signal) =>
          new Promise<CompletionResponse>((_resolve, reject) => {
            signal?.addEventListener("abort", () => reject(new Error("request aborted")));
          }),
      },
      {},
    );
    const controller = new AbortController();
    const pending = client.checkMessage("slow", { signal: controller.signal });
    controller.abort();

    const res = await pending;
    expect(res.verdict.isMalicious).toBe(false);
    expect(res.error?.message).toBe("error calling classifier: request aborted");
  });

  it("returns identical verdicts for identical input", async () => {
    const reply = '{"is_malicious": true, "error_code": "CONTENT_HARASSMENT", "reason": "insult"}';
    const client = makeClient(stubCompletion([reply]));
    const [a, b, c] = await Promise.all([
      client.checkMessage("same"),
      client.checkMessage("same"),
      client.checkMessage("same"),
    ]);
    expect(a).toEqual(b);
    expect(b).toEqual(c);
    expect(a.verdict).not.toBe(b.verdict);
  });

  it("filterMessage is the same check", async () => {
    const client = makeClient(stubCompletion([SAFE]), ["spam"]);
    expect(await client.filterMessage("spam")).toEqual(await client.checkMessage("spam"));
  });
});

describe("ModerationClient configuration", () => {
  it("is inert without an API key and allows everything", async () => {
    const lines: Array<{ level: number; msg: string }> = [];
    const client = new ModerationClient({ blockedTerms: ["spam"], logger: capturingLogger(lines) }, {});

    expect(client.isConfigured).toBe(false);
    expect(client.model).toBe(DEFAULT_MODEL);
    expect(client.blockedTerms).toEqual([]);

    const res = await client.checkMessage("spam spam spam");
    expect(res).toEqual({ verdict: { isMalicious: false, errorCode: "", reason: "" }, error: null });
    expect(lines.map((l) => l.msg)).toEqual([
      "GROQ_API_KEY not set, moderation client will allow every message",
      "moderation client not initialized, allowing message",
    ]);
    expect(lines.every((l) => l.level === 40)).toBe(true);
  });

  it("reads key and model from the environment", () => {
    const stub = stubCompletion([SAFE]);
    const client = new ModerationClient(
      { completion: stub.fn, blockedTerms: [], logger: silentLogger },
      { GROQ_API_KEY: "test-key", GROQ_MODEL: "env-model" },
    );
    expect(client.isConfigured).toBe(true);
    expect(client.model).toBe("env-model");
  });

  it("prefers explicit values over the environment", () => {
    const client = new ModerationClient(
      { apiKey: "test-key", model: "explicit-model", completion: stubCompletion([SAFE]).fn, logger: silentLogger },
      { GROQ_MODEL: "env-model" },
    );
    expect(client.model).toBe("explicit-model");
  });

  it("falls back to the default model", () => {
    const client = new ModerationClient({ apiKey: "test-key", completion: stubCompletion([SAFE]).fn, logger: silentLogger }, {});
    expect(client.model).toBe("llama-3.1-8b-instant");
  });

  it("uses the bundled term list unless one is given", () => {
    const stub = stubCompletion([SAFE]);
    const withDefaults = new ModerationClient({ apiKey: "test-key", completion: stub.fn, logger: silentLogger }, {});
    expect(withDefaults.blockedTerms).toBe(defaultBlockedTerms());

    const disabled = new ModerationClient(
      { apiKey: "test-key", completion: stub.fn, blockedTerms: [], logger: silentLogger },
      {},
    );
    expect(disabled.blockedTerms).toEqual([]);
  });

  it("copies the given term list", async () => {
    const terms = ["spam"];
    const stub = stubCompletion([SAFE]);
    const client = makeClient(stub, terms);
    terms.push("hello");

    const res = await client.checkMessage("hello");
    expect(res.verdict.isMalicious).toBe(false);
    expect(stub.calls).toHaveLength(1);
  });
});
