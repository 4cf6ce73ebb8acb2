/**
 * Structured logging via pino.
 * Credentials are redacted by path; output goes to stderr so it never mixes
 * with command output on stdout.
 */

import pino from "pino";
import { homedir } from "node:os";
import { join } from "node:path";

const LOG_DIR = join(process.env["CHATDECK_HOME"] ?? join(homedir(), ".chatdeck"), "logs");

const REDACT_PATHS = [
  "apiKey",
  "token",
  "accessToken",
  "password",
  "secret",
  "authorization",
  "headers.authorization",
  "*.apiKey",
  "*.token",
  "*.password",
  "*.secret",
  "*.authorization",
];

const options: pino.LoggerOptions = {
  name: "chatdeck",
  level: process.env["CHATDECK_LOG_LEVEL"] ?? "error",
  redact: {
    paths: REDACT_PATHS,
    censor: "[REDACTED]",
  },
  timestamp: pino.stdTimeFunctions.isoTime,
};

const logger =
  process.env["NODE_ENV"] === "development"
    ? pino({
        ...options,
        transport: {
          target: "pino/file",
          options: { destination: join(LOG_DIR, "chatdeck.log"), mkdir: true },
        },
      })
    : pino(options, pino.destination({ dest: 2, sync: true }));

export { logger };
