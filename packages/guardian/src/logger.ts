/**
 * Structured logging.
 *
 * JSON logs via pino; pretty-printed in development. Secrets never reach
 * the output.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { AppConfig } from "./config.js";

export type { Logger } from "pino";

export const REDACT_PATHS = [
  "AGENT_PRIVATE_KEY",
  "*.AGENT_PRIVATE_KEY",
  "privateKey",
  "*.privateKey",
  "apiKey",
  "*.apiKey",
  "OPERATOR_API_KEYS",
  "*.OPERATOR_API_KEYS",
];

export function createLogger(
  config: Pick<AppConfig, "LOG_LEVEL" | "NODE_ENV">,
): Logger {
  return pino({
    name: "yield-guardian",
    level: config.LOG_LEVEL,
    redact: { paths: REDACT_PATHS, censor: "[redacted]" },
    ...(config.NODE_ENV === "development"
      ? { transport: { target: "pino-pretty" } }
      : {}),
  });
}
