/**
 * slash-registry — src/lib/logger.ts
 * WHAT: Pino logger with light redaction and Sentry capture on error-level logs.
 * FLOWS: create logger → redact helpers → hook to captureException on error logs
 * DOCS:
 *  - Pino: https://getpino.io/#/docs/api
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import pino from "pino";

/**
 * Token pattern: bot tokens are 3 base64-ish segments separated by dots.
 * DSN pattern: Sentry DSNs embed auth tokens in URLs. We keep the host, redact the secret.
 * Mention pattern: @everyone/@here coming from option values should never be echoed raw.
 */
const tokenRe = /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g;
const dsnRe = /(https?:\/\/)([^:@]+):[^@]+@/gi;
const mentionRe = /@(everyone|here)/gi;

// Only warn once per process when the Sentry module fails to load
let sentryImportWarned = false;

/**
 * Sanitizes strings before logging. Use on option values and anything else a user typed.
 * Truncates at 300 chars.
 */
export function redact(value: string): string {
  if (!value) return "";
  let sanitized = value.replace(/\s+/g, " ").trim();
  sanitized = sanitized.replace(tokenRe, "[redacted_token]");
  sanitized = sanitized.replace(dsnRe, "$1$2:[redacted]@");
  sanitized = sanitized.replace(mentionRe, "@redacted");
  if (sanitized.length > 300) {
    sanitized = `${sanitized.slice(0, 300)}...`;
  }
  return sanitized;
}

/**
 * Picks the fields worth keeping from whatever was thrown. REST errors carry the
 * whole request body; we only want name/code/message/stack.
 */
export function serializeError(e: unknown): Record<string, unknown> {
  if (e instanceof Error) {
    return {
      name: e.name,
      code: "code" in e ? e.code : undefined,
      message: e.message,
      stack: e.stack,
    };
  }
  return { message: String(e) };
}

const logLevel = process.env.LOG_LEVEL ?? "info";
const isVitest = !!process.env.VITEST_WORKER_ID;
const wantPretty = isVitest || (process.env.LOG_PRETTY === "true" && process.stdout.isTTY);

export const logger = pino({
  level: logLevel,
  // Newline-delimited JSON unless pretty output was asked for
  ...(wantPretty
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
            singleLine: false,
          },
        },
      }
    : {}),
  base: undefined,
  serializers: {
    err: serializeError,
  },
  /**
   * Error-level records that carry an Error are forwarded to Sentry, so callers
   * only ever need logger.error({ err }, "...").
   */
  hooks: {
    logMethod(args, method, level) {
      if (level >= pino.levels.values.error) {
        const [firstArg, secondArg]: unknown[] = args;
        const errorCandidate =
          firstArg instanceof Error
            ? firstArg
            : firstArg && typeof firstArg === "object" && "err" in firstArg
              ? firstArg.err
              : undefined;

        if (errorCandidate instanceof Error) {
          const message = typeof secondArg === "string" ? secondArg : undefined;
          const label = pino.levels.labels[level] ?? "error";

          // Dynamic import: sentry.ts imports this module
          import("./sentry.js")
            .then(({ captureException, isSentryEnabled }) => {
              if (isSentryEnabled()) {
                captureException(errorCandidate, { message, level: label });
              }
            })
            .catch((importErr: unknown) => {
              if (!sentryImportWarned) {
                sentryImportWarned = true;
                console.warn("[logger] Failed to import Sentry module:", serializeError(importErr).message);
              }
            });
        }
      }

      return method.apply(this, args);
    },
  },
});
