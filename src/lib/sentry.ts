/**
 * slash-registry — src/lib/sentry.ts
 * WHAT: Sentry bootstrap and small helpers for capture, breadcrumbs and spans.
 * FLOWS: initializeSentry() → isSentryEnabled → captureException/addBreadcrumb → flushSentry on shutdown
 * DOCS:
 *  - Sentry Node SDK: https://docs.sentry.io/platforms/javascript/guides/node/
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import * as Sentry from "@sentry/node";
import fs from "node:fs";
import path from "node:path";
import { logger } from "./logger.js";

export interface SentryConfig {
  SENTRY_DSN?: string;
  SENTRY_ENVIRONMENT?: string;
  SENTRY_TRACES_SAMPLE_RATE: number;
  NODE_ENV: string;
}

let sentryEnabled = false;

function hasValidDsn(dsn: string | undefined): dsn is string {
  // Format: https://{key}@{org}.ingest.sentry.io/{project}
  if (!dsn) return false;
  try {
    const parsed = new URL(dsn);
    return (
      (parsed.protocol === "https:" || parsed.protocol === "http:") &&
      parsed.username.length > 0 &&
      parsed.pathname.length > 1
    );
  } catch {
    return false;
  }
}

function getVersion(): string {
  try {
    const packagePath = path.join(process.cwd(), "package.json");
    const packageJson: unknown = JSON.parse(fs.readFileSync(packagePath, "utf-8"));
    if (packageJson && typeof packageJson === "object" && "version" in packageJson) {
      return String(packageJson.version);
    }
    return "unknown";
  } catch {
    return "unknown";
  }
}

/**
 * Initialize Sentry error tracking.
 * Only activates with a valid SENTRY_DSN, and never under Vitest.
 */
export function initializeSentry(config: SentryConfig): void {
  if (process.env.VITEST_WORKER_ID) {
    return;
  }

  if (!hasValidDsn(config.SENTRY_DSN)) {
    logger.info("Sentry DSN missing or invalid, error tracking disabled");
    return;
  }

  try {
    Sentry.init({
      dsn: config.SENTRY_DSN,
      environment: config.SENTRY_ENVIRONMENT || config.NODE_ENV,
      release: `slash-registry@${getVersion()}`,
      tracesSampleRate: config.SENTRY_TRACES_SAMPLE_RATE,

      beforeSend(event) {
        if (event.message) {
          event.message = event.message.replace(
            /[A-Za-z0-9_-]{24}\.[A-Za-z0-9_-]{6}\.[A-Za-z0-9_-]{27}/g,
            "[REDACTED_TOKEN]"
          );
        }
        return event;
      },

      // Access and timeout failures are logged with guild context already
      ignoreErrors: ["CommandAccessError", "GuildSyncTimeoutError", "AbortError", "ECONNRESET", "ETIMEDOUT"],
      debug: config.NODE_ENV === "development",
    });

    sentryEnabled = true;
    logger.info({ environment: config.SENTRY_ENVIRONMENT || config.NODE_ENV }, "Sentry initialized");
  } catch (err) {
    logger.error({ err }, "Failed to initialize Sentry");
    sentryEnabled = false;
  }
}

export function isSentryEnabled(): boolean {
  return sentryEnabled;
}

/**
 * Capture an exception in Sentry
 */
export function captureException(error: unknown, context?: Record<string, unknown>): string | null {
  if (!sentryEnabled) return null;

  return Sentry.captureException(error, {
    contexts: context ? { custom: context } : undefined,
  });
}

/**
 * Add breadcrumb for debugging context
 */
export function addBreadcrumb(breadcrumb: {
  message: string;
  category?: string;
  level?: Sentry.SeverityLevel;
  data?: Record<string, unknown>;
}): void {
  if (!sentryEnabled) return;

  Sentry.addBreadcrumb(breadcrumb);
}

/**
 * Flush any pending events (use before shutdown)
 */
export async function flushSentry(timeout = 2000): Promise<boolean> {
  if (!sentryEnabled) return true;

  try {
    return await Sentry.close(timeout);
  } catch (err) {
    logger.error({ err }, "Failed to flush Sentry events");
    return false;
  } finally {
    sentryEnabled = false;
  }
}

/**
 * Runs fn inside a Sentry span when tracing is on, plainly otherwise.
 * USAGE: await inSpan("commands.sync.scope", async () => { ... })
 */
export async function inSpan<T>(name: string, fn: () => Promise<T>): Promise<T> {
  if (!sentryEnabled) {
    return fn();
  }
  return Sentry.startSpan({ name }, fn);
}
