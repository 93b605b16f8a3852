import "dotenv/config";

import { loadConfig } from "../config";
import { createModerationClient } from "../core/client";
import { logger } from "../util/logger";
import { createApp } from "./app";

const config = loadConfig();
logger.level = config.logLevel;

const client = createModerationClient({
  apiKey: config.apiKey,
  model: config.model,
  baseURL: config.baseURL,
  requestTimeoutMs: config.checkTimeoutMs,
});

const app = createApp({
  client,
  jwtSecret: config.jwtSecret,
  trustedProxies: config.trustedProxies,
  checkTimeoutMs: config.checkTimeoutMs,
});

// ---- Start server ----
app.listen(config.port, () => {
  logger.info({ port: config.port }, "listening");
});
