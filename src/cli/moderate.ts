import "dotenv/config";
import { Command } from "commander";
import fs from "node:fs";
import readline from "node:readline";

import { loadConfig } from "../config";
import { createModerationClient, type CheckResult, type ModerationClient } from "../core/client";

const program = new Command();

program
  .name("moderate")
  .description("Two-stage message moderation (blocked terms, then LLM classifier)")
  .argument("[text...]", "message to check (omit when using --file)")
  .option("-f, --file <jsonl>", "JSONL file with {\"text\":\"...\"} per line")
  .option("--json", "print raw JSON result(s)", false)
  .option("--timeout <ms>", "classifier timeout per message (ms)", (v) => parseInt(v, 10))
  .parse(process.argv);

type CliOpts = {
  file?: string;
  json?: boolean;
  timeout?: number;
};

/** 0 acceptable, 2 classifier unavailable (allowed), 3 rejected. */
function exitCodeFor(result: CheckResult): number {
  if (result.verdict.isMalicious) return 3;
  if (result.error) return 2;
  return 0;
}

function printResult(res: CheckResult, jsonMode: boolean) {
  if (jsonMode) {
    const out = res.error ? { ...res.verdict, error: res.error.message } : res.verdict;
    process.stdout.write(JSON.stringify(out) + "\n");
    return;
  }
  const lines = [`verdict: ${res.verdict.isMalicious ? "REJECTED" : "ACCEPTED"}`];
  if (res.verdict.isMalicious) {
    lines.push(`error_code: ${res.verdict.errorCode}`);
    if (res.verdict.reason) lines.push(`reason: ${res.verdict.reason}`);
  }
  if (res.error) {
    lines.push(`warning: ${res.error.message}`);
  }
  process.stdout.write(lines.join("\n") + "\n");
}

function signalFor(timeoutMs: number): AbortSignal | undefined {
  return timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined;
}

async function handleSingle(client: ModerationClient, text: string, opts: CliOpts, timeoutMs: number) {
  const res = await client.checkMessage(text, { signal: signalFor(timeoutMs) });
  printResult(res, !!opts.json);
  return exitCodeFor(res);
}

async function handleBatch(client: ModerationClient, file: string, opts: CliOpts, timeoutMs: number) {
  if (!fs.existsSync(file)) {
    console.error(`[error] file not found: ${file}`);
    return 1;
  }

  const rl = readline.createInterface({
    input: fs.createReadStream(file, { encoding: "utf8" }),
    crlfDelay: Infinity,
  });

  let worstExit = 0;
  for await (const line of rl) {
    const trimmed = line.trim();
    if (!trimmed) continue;

    let text: string;
    try {
      const obj: unknown = JSON.parse(trimmed);
      if (typeof obj !== "object" || obj === null || !("text" in obj) || typeof obj.text !== "string" || !obj.text) {
        throw new Error("missing text");
      }
      text = obj.text;
    } catch {
      console.error(`[warn] skipping invalid JSONL line: ${trimmed.slice(0, 120)}`);
      continue;
    }

    const res = await client.checkMessage(text, { signal: signalFor(timeoutMs) });
    printResult(res, !!opts.json);
    worstExit = Math.max(worstExit, exitCodeFor(res));
  }
  return worstExit;
}

async function main(): Promise<number> {
  const opts = program.opts<CliOpts>();
  const inline = program.args.join(" ");

  if (opts.file && inline) {
    console.error("[error] Provide either TEXT args or --file, not both.");
    return 1;
  }
  if (!opts.file && !inline) {
    program.help({ error: true });
  }

  const config = loadConfig();
  const timeoutMs = opts.timeout ?? config.checkTimeoutMs;
  const client = createModerationClient({
    apiKey: config.apiKey,
    model: config.model,
    baseURL: config.baseURL,
    requestTimeoutMs: timeoutMs,
  });

  return opts.file
    ? handleBatch(client, opts.file, opts, timeoutMs)
    : handleSingle(client, inline, opts, timeoutMs);
}

main().then(
  (code) => process.exit(code),
  (err: unknown) => {
    console.error(`[error] ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  },
);
