/**
 * slash-registry — src/lib/errors.ts
 * WHAT: Error classes for the registry/sync/dispatch taxonomy and a discriminated-union classifier.
 * FLOWS:
 *  - classifyError(err) → ClassifiedError union type
 *  - isMissingAccess(err) → boolean (guild should be skipped, not fatal)
 *  - isRecoverable(err) → boolean (worth retrying)
 *  - shouldReportToSentry(err) → boolean (filter noise)
 * USAGE:
 *  const classified = classifyError(err);
 *  if (classified.kind === "access") { ...skip guild... }
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

// ===== Error Classes =====

/**
 * The application lacks the applications.commands scope (or any access) in a guild.
 */
export class CommandAccessError extends Error {
  constructor(
    public readonly guildId: string | null,
    options?: { cause?: unknown }
  ) {
    super(
      guildId
        ? `Missing access to guild ${guildId} or no applications.commands scope there`
        : "Missing access to global application commands",
      options
    );
    this.name = "CommandAccessError";
  }
}

/** A per-guild synchronization pass ran past its deadline. */
export class GuildSyncTimeoutError extends Error {
  constructor(
    public readonly guildId: string,
    public readonly timeoutMs: number
  ) {
    super(`Synchronization for guild ${guildId} exceeded ${timeoutMs}ms`);
    this.name = "GuildSyncTimeoutError";
  }
}

/** One or more guild passes failed with a transport error. */
export class CommandSyncError extends Error {
  constructor(public readonly failures: ReadonlyArray<{ guildId: string; error: unknown }>) {
    super(
      `Command synchronization failed for ${failures.length} guild(s): ${failures
        .map((f) => f.guildId)
        .join(", ")}`,
      { cause: failures[0]?.error }
    );
    this.name = "CommandSyncError";
  }
}

/** Dispatch could not find the addressed command node. */
export class RoutingError extends Error {
  constructor(
    message: string,
    public readonly path: readonly string[],
    public readonly guildId: string | null
  ) {
    super(message);
    this.name = "RoutingError";
  }
}

/** A check attached to a node (or its unit) returned false. */
export class CheckFailureError extends Error {
  constructor(public readonly command: string) {
    super(`A check for "${command}" did not pass`);
    this.name = "CheckFailureError";
  }
}

/** Environment validation failed; every issue is listed. */
export class ConfigError extends Error {
  constructor(public readonly issues: readonly string[]) {
    super(`Environment validation failed:\n${issues.join("\n")}`);
    this.name = "ConfigError";
  }
}

// ===== Classified Error Union =====

export interface AppError {
  kind: string;
  message: string;
  cause?: Error;
}

export interface ValidationErrorInfo extends AppError {
  kind: "validation";
  field?: string;
}

/** Missing access (50001) or HTTP 403 while talking to the command endpoints. */
export interface AccessErrorInfo extends AppError {
  kind: "access";
  guildId: string | null;
  code?: number;
}

/**
 * Other REST errors. Codes worth knowing here:
 * - 10063: Unknown application command (edited a command that was deleted remotely)
 * - 30032: Max number of application commands reached
 * - 50035: Invalid form body (the platform rejected our wire shape)
 */
export interface DiscordApiErrorInfo extends AppError {
  kind: "discord_api";
  code: number;
  httpStatus?: number;
  method?: string;
  path?: string;
}

export interface NetworkErrorInfo extends AppError {
  kind: "network";
  code: string;
  host?: string;
}

export interface RoutingErrorInfo extends AppError {
  kind: "routing";
  path: readonly string[];
}

export interface CheckErrorInfo extends AppError {
  kind: "check";
  command: string;
}

export interface ConfigErrorInfo extends AppError {
  kind: "config";
  issues: readonly string[];
}

export interface UnknownErrorInfo extends AppError {
  kind: "unknown";
}

export type ClassifiedError =
  | ValidationErrorInfo
  | AccessErrorInfo
  | DiscordApiErrorInfo
  | NetworkErrorInfo
  | RoutingErrorInfo
  | CheckErrorInfo
  | ConfigErrorInfo
  | UnknownErrorInfo;

const NETWORK_CODES = ["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE", "EAI_AGAIN"];

function readProp(err: object, key: string): unknown {
  return key in err ? Reflect.get(err, key) : undefined;
}

/**
 * Classify any caught error into a discriminated union.
 *
 * Ordered from most specific to least: our own classes, then REST errors
 * (duck-typed by name + numeric code so mocks classify the same way), then
 * libuv network codes, then unknown.
 */
export function classifyError(err: unknown): ClassifiedError {
  if (!err) {
    return { kind: "unknown", message: "Unknown error (null/undefined)" };
  }

  const cause = err instanceof Error ? err : undefined;

  if (err instanceof CommandAccessError) {
    return { kind: "access", guildId: err.guildId, message: err.message, cause };
  }
  if (err instanceof GuildSyncTimeoutError) {
    return { kind: "access", guildId: err.guildId, message: err.message, cause };
  }
  if (err instanceof RoutingError) {
    return { kind: "routing", path: err.path, message: err.message, cause };
  }
  if (err instanceof CheckFailureError) {
    return { kind: "check", command: err.command, message: err.message, cause };
  }
  if (err instanceof ConfigError) {
    return { kind: "config", issues: err.issues, message: err.message, cause };
  }

  if (typeof err !== "object") {
    return { kind: "unknown", message: String(err) };
  }

  const messageProp = readProp(err, "message");
  const message = typeof messageProp === "string" ? messageProp : String(err);
  const name = readProp(err, "name");
  const code = readProp(err, "code");

  if (name === "CommandValidationError") {
    const field = readProp(err, "field");
    return {
      kind: "validation",
      field: typeof field === "string" ? field : undefined,
      message,
      cause,
    };
  }

  if (typeof name === "string" && name.includes("DiscordAPIError") && typeof code === "number") {
    const status = readProp(err, "status") ?? readProp(err, "httpStatus");
    const httpStatus = typeof status === "number" ? status : undefined;
    if (code === 50001 || httpStatus === 403) {
      return { kind: "access", guildId: null, code, message, cause };
    }
    const method = readProp(err, "method");
    const url = readProp(err, "url") ?? readProp(err, "path");
    return {
      kind: "discord_api",
      code,
      httpStatus,
      method: typeof method === "string" ? method : undefined,
      path: typeof url === "string" ? url : undefined,
      message,
      cause,
    };
  }

  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    const host = readProp(err, "hostname") ?? readProp(err, "host");
    return {
      kind: "network",
      code,
      host: typeof host === "string" ? host : undefined,
      message,
      cause,
    };
  }

  return { kind: "unknown", message, cause };
}

// ===== Error Predicates =====

/**
 * True when a guild pass should be skipped rather than failing the run:
 * missing access, a 403, or the per-guild timeout.
 */
export function isMissingAccess(err: unknown): boolean {
  return classifyError(err).kind === "access";
}

/**
 * Check if error is recoverable (worth retrying). Rate limits are handled
 * inside the REST client, so only network blips and 5xx count.
 */
export function isRecoverable(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "network":
      return true;
    case "discord_api": {
      const status = err.httpStatus ?? 0;
      return status >= 500 && status < 600;
    }
    default:
      return false;
  }
}

/**
 * Sentry alerts should mean "something is actually broken".
 */
export function shouldReportToSentry(err: ClassifiedError): boolean {
  switch (err.kind) {
    case "discord_api": {
      const ignoredCodes = [
        10062, // Unknown interaction (response window expired)
        40060, // Interaction already acknowledged
      ];
      return !ignoredCodes.includes(err.code);
    }
    case "access":
    case "network":
    case "check":
    case "validation":
      return false;
    default:
      return true;
  }
}

// ===== Error Context Helpers =====

/**
 * Extract structured context from a classified error for logging
 */
export function errorContext(
  err: ClassifiedError,
  extra: Record<string, unknown> = {}
): Record<string, unknown> {
  const base = {
    errorKind: err.kind,
    errorMessage: err.message,
    ...extra,
  };

  switch (err.kind) {
    case "validation":
      return { ...base, field: err.field };
    case "access":
      return { ...base, guildId: err.guildId, discordCode: err.code };
    case "discord_api":
      return {
        ...base,
        discordCode: err.code,
        httpStatus: err.httpStatus,
        method: err.method,
        path: err.path,
      };
    case "network":
      return { ...base, networkCode: err.code, host: err.host };
    case "routing":
      return { ...base, path: err.path.join(" ") };
    case "check":
      return { ...base, command: err.command };
    default:
      return base;
  }
}
