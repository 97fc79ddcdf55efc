/**
 * slash-registry — src/commands/invoke.ts
 * WHAT: Check chain + handler execution shared by every invocable node.
 * FLOWS: runInvocation(node, ctx, sink, body) → checks → body() → error handler | sink → InvokeOutcome
 * Nothing thrown by a check, a handler, an error handler or the sink escapes.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { CheckFailureError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type { InvocableNode } from "./nodes.js";
import type { ErrorSink, InvocationContext, InvokeOutcome } from "./types.js";

async function notifySink(node: InvocableNode, ctx: InvocationContext, error: unknown, sink: ErrorSink): Promise<void> {
  try {
    await sink(node, ctx, error);
  } catch (sinkErr) {
    logger.error(
      { evt: "error_sink_failed", cmd: node.qualifiedName, traceId: ctx.traceId, err: sinkErr },
      "[invoke] error sink threw"
    );
  }
}

/** The node's own handler (nearest in sub → group → command order) sees the error once, else the sink. */
export async function routeError(
  node: InvocableNode,
  ctx: InvocationContext,
  error: unknown,
  sink: ErrorSink
): Promise<void> {
  const handler = node.resolveErrorHandler();
  if (!handler) {
    await notifySink(node, ctx, error, sink);
    return;
  }
  try {
    await handler(ctx, error);
  } catch (handlerErr) {
    await notifySink(node, ctx, handlerErr, sink);
  }
}

export async function runInvocation(
  node: InvocableNode,
  ctx: InvocationContext,
  sink: ErrorSink,
  body: () => unknown
): Promise<InvokeOutcome> {
  try {
    for (const check of node.effectiveChecks()) {
      if (!(await check(ctx))) {
        throw new CheckFailureError(node.qualifiedName);
      }
    }
  } catch (err) {
    logger.debug({ evt: "check_failed", cmd: node.qualifiedName, traceId: ctx.traceId }, "[invoke] check failed");
    await routeError(node, ctx, err, sink);
    return "check_failed";
  }

  try {
    await body();
    return "completed";
  } catch (err) {
    await routeError(node, ctx, err, sink);
    return "errored";
  }
}

/** Autocomplete on an option whose node has no autocomplete handler: answer with no choices. */
export async function answerWithoutHandler(node: InvocableNode, ctx: InvocationContext): Promise<InvokeOutcome> {
  logger.warn(
    { evt: "autocomplete_no_handler", cmd: node.qualifiedName, option: ctx.focused?.name, traceId: ctx.traceId },
    `[invoke] ${node.qualifiedName} has no autocomplete handler`
  );
  if (ctx.responder) {
    try {
      await ctx.responder.autocomplete([]);
    } catch (err) {
      logger.warn({ evt: "autocomplete_reply_failed", cmd: node.qualifiedName, err }, "[invoke] empty autocomplete reply failed");
    }
  }
  return "noop";
}
