/**
 * slash-registry — src/dispatch/errorSink.ts
 * WHAT: Default process-wide sink for failures no node-level error handler took.
 * FLOWS: classifyError → log (error level reaches Sentry) → ephemeral reply to the invoker
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { ErrorSink } from "../commands/types.js";
import { type ClassifiedError, classifyError, errorContext, shouldReportToSentry } from "../lib/errors.js";
import { logger, redact } from "../lib/logger.js";
import { ctx as requestContext } from "../lib/reqctx.js";

export interface ErrorSinkMessages {
  failure: string;
  checkFailed: string;
  unavailable: string;
}

export const DEFAULT_MESSAGES: ErrorSinkMessages = {
  failure: "Something went wrong while running this command.",
  checkFailed: "You can't use this command here.",
  unavailable: "This command is no longer available.",
};

function messageFor(classified: ClassifiedError, messages: ErrorSinkMessages): string {
  switch (classified.kind) {
    case "check":
      return messages.checkFailed;
    case "routing":
      return messages.unavailable;
    default:
      return messages.failure;
  }
}

export function createDefaultErrorSink(messages: Partial<ErrorSinkMessages> = {}): ErrorSink {
  const text = { ...DEFAULT_MESSAGES, ...messages };

  return async (node, ctx, error) => {
    const classified = classifyError(error);
    const request = requestContext();
    const fields = errorContext(classified, {
      evt: "command_error",
      // Without a node the name is whatever the payload carried
      cmd: node?.qualifiedName ?? redact(ctx.payload.data.name),
      traceId: ctx.traceId,
      guildId: ctx.guildId,
      userId: ctx.userId,
      channelId: request.channelId ?? null,
      kind: request.kind,
      err: error,
    });
    if (shouldReportToSentry(classified)) {
      logger.error(fields, `[dispatch] ${String(fields.cmd)} failed`);
    } else {
      logger.warn(fields, `[dispatch] ${String(fields.cmd)} failed (${classified.kind})`);
    }

    // Autocomplete cannot carry a message
    if (!ctx.responder || ctx.isAutocomplete) return;
    try {
      await ctx.responder.reply({ content: messageFor(classified, text), ephemeral: true });
    } catch (replyErr) {
      logger.warn({ evt: "error_reply_failed", traceId: ctx.traceId, err: replyErr }, "[dispatch] could not notify invoker");
    }
  };
}
