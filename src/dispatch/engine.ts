/**
 * slash-registry — src/dispatch/engine.ts
 * WHAT: Maps one inbound invocation to a node and calls it with bound arguments.
 * FLOWS:
 *  dispatch(payload) → runWithCtx → route (command → group → sub-command | command → sub-command | command)
 *    → bindArguments → node.invoke | node.invokeAutocomplete → DispatchOutcome
 * Routing failures go to the error sink once and the invocation is dropped. Reads the
 * registry only; never touches remote bindings.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { ApplicationCommandOptionType, InteractionType } from "discord.js";
import type { InvocableNode, RootCommand } from "../commands/nodes.js";
import type { CommandRegistry } from "../commands/registry.js";
import {
  type CommandArgs,
  type ErrorSink,
  type FocusedOption,
  type InvocationContext,
  type InvokeOutcome,
  kindOfType,
} from "../commands/types.js";
import { RoutingError } from "../lib/errors.js";
import { logger, redact } from "../lib/logger.js";
import { newTraceId, runWithCtx } from "../lib/reqctx.js";
import { addBreadcrumb } from "../lib/sentry.js";
import { createDefaultErrorSink } from "./errorSink.js";
import type { InvocationOption, InvocationPayload } from "./payload.js";
import { bindArguments, resolveTarget } from "./resolve.js";
import type { InteractionResponder } from "./responder.js";

export type DispatchOutcome =
  | { status: "invoked"; node: InvocableNode; outcome: InvokeOutcome }
  | { status: "routing_error"; error: RoutingError };

export interface DispatchEngineOptions {
  errorSink?: ErrorSink;
  /** Builds the responder for one payload; none means handlers cannot reply. */
  responderFor?: (payload: InvocationPayload) => InteractionResponder | null;
}

type Route =
  | { ok: true; node: InvocableNode; args: CommandArgs; focused: FocusedOption | null }
  | { ok: false; node: RootCommand | null; error: RoutingError };

export class DispatchEngine {
  private readonly sink: ErrorSink;
  private readonly responderFor: (payload: InvocationPayload) => InteractionResponder | null;

  constructor(
    private readonly registry: CommandRegistry,
    options: DispatchEngineOptions = {}
  ) {
    this.sink = options.errorSink ?? createDefaultErrorSink();
    this.responderFor = options.responderFor ?? (() => null);
  }

  async dispatch(payload: InvocationPayload): Promise<DispatchOutcome> {
    const isAutocomplete = payload.type === InteractionType.ApplicationCommandAutocomplete;
    const guildId = payload.data.guild_id ?? null;
    const userId = payload.member?.user.id ?? payload.user?.id ?? null;
    const traceId = newTraceId();

    return runWithCtx(
      {
        traceId,
        cmd: payload.data.name,
        kind: isAutocomplete ? "autocomplete" : (kindOfType(payload.data.type) ?? undefined),
        userId: userId ?? undefined,
        guildId: payload.guild_id ?? null,
        channelId: payload.channel_id ?? null,
      },
      async () => {
        const responder = this.responderFor(payload);
        const makeCtx = (command: InvocationContext["command"], focused: FocusedOption | null): InvocationContext => ({
          payload,
          command,
          guildId,
          userId,
          locale: payload.locale ?? null,
          isAutocomplete,
          focused,
          traceId,
          responder,
        });

        const route = this.route(payload, guildId);
        if (!route.ok) {
          logger.warn(
            { evt: "dispatch_routing_error", path: route.error.path.map(redact), guildId, traceId },
            `[dispatch] ${redact(route.error.message)}`
          );
          const ctx = makeCtx(route.node, null);
          try {
            await this.sink(route.node, ctx, route.error);
          } catch (sinkErr) {
            logger.error({ evt: "error_sink_failed", traceId, err: sinkErr }, "[dispatch] error sink threw");
          }
          return { status: "routing_error", error: route.error };
        }

        const ctx = makeCtx(route.node, route.focused);
        addBreadcrumb({
          message: `${isAutocomplete ? "autocomplete" : "invoke"} ${route.node.qualifiedName}`,
          category: "command",
          level: "info",
          data: { traceId, guildId },
        });
        const started = Date.now();
        const outcome = isAutocomplete
          ? await route.node.invokeAutocomplete(ctx, route.args, this.sink)
          : await route.node.invoke(ctx, route.args, this.sink);

        logger.debug(
          {
            evt: isAutocomplete ? "autocomplete_done" : "dispatch_done",
            cmd: route.node.qualifiedName,
            outcome,
            durationMs: Date.now() - started,
            traceId,
          },
          `[dispatch] ${route.node.qualifiedName} → ${outcome}`
        );
        return { status: "invoked", node: route.node, outcome };
      }
    );
  }

  private route(payload: InvocationPayload, guildId: string | null): Route {
    const { data } = payload;
    const path = [data.name];
    const fail = (message: string, node: RootCommand | null = null): Route => ({
      ok: false,
      node,
      error: new RoutingError(message, [...path], guildId),
    });

    const kind = kindOfType(data.type);
    if (!kind) return fail(`unsupported command type ${data.type} for "${data.name}"`);

    const root = this.registry.get(kind, data.name, guildId);
    if (!root) return fail(`unknown command "${data.name}" in scope ${guildId ?? "global"}`);
    if (root.disabled) return fail(`command "${data.name}" is disabled`, root);

    if (root.kind === "context") {
      const target = resolveTarget(root.commandKind, data.target_id, data.resolved);
      return { ok: true, node: root, args: target === null ? {} : { target }, focused: null };
    }

    const layer: readonly InvocationOption[] = data.options ?? [];
    const first = layer[0];

    if (first?.type === ApplicationCommandOptionType.SubcommandGroup) {
      path.push(first.name);
      const group = root.children.get(first.name);
      if (!group || group.kind !== "group") return fail(`unknown sub-command group "${path.join(" ")}"`, root);
      const subLayer = first.options?.[0];
      if (!subLayer || subLayer.type !== ApplicationCommandOptionType.Subcommand) {
        return fail(`sub-command group "${path.join(" ")}" invoked without a sub-command`, root);
      }
      path.push(subLayer.name);
      const sub = group.children.get(subLayer.name);
      if (!sub?.handler) return fail(`unknown sub-command "${path.join(" ")}"`, root);
      return { ok: true, node: sub, ...bindArguments(sub, subLayer.options ?? [], data.resolved) };
    }

    if (first?.type === ApplicationCommandOptionType.Subcommand) {
      path.push(first.name);
      const sub = root.children.get(first.name);
      if (!sub || sub.kind !== "sub" || !sub.handler) return fail(`unknown sub-command "${path.join(" ")}"`, root);
      return { ok: true, node: sub, ...bindArguments(sub, first.options ?? [], data.resolved) };
    }

    if (root.isContainer) return fail(`command "${data.name}" needs a sub-command`, root);
    if (!root.handler) return fail(`command "${data.name}" has no handler`, root);
    return { ok: true, node: root, ...bindArguments(root, layer, data.resolved) };
  }
}
