/**
 * slash-registry — src/client.ts
 * WHAT: The process-level context object. Owns one registry and hands it to both engines.
 * FLOWS:
 *  new CommandClient({ config }) → register commands / loadUnit → start() (sync) → handle(payload) per interaction
 *  reloadUnit(unit) → registry reload → sync or rebind (SYNC_ON_RELOAD) → shutdown()
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { REST } from "discord.js";
import type { RootCommand } from "./commands/nodes.js";
import { type CommandUnit, CommandRegistry, type UnloadResult } from "./commands/registry.js";
import type { ErrorSink } from "./commands/types.js";
import { type DispatchOutcome, DispatchEngine } from "./dispatch/engine.js";
import type { InvocationPayload } from "./dispatch/payload.js";
import { type InteractionResponder, RestInteractionResponder } from "./dispatch/responder.js";
import type { AppConfig } from "./lib/env.js";
import { logger } from "./lib/logger.js";
import { flushSentry } from "./lib/sentry.js";
import { CommandSyncEngine, type SyncReport } from "./sync/engine.js";
import { type CommandTransport, RestCommandTransport } from "./sync/transport.js";

export type ClientConfig = Pick<
  AppConfig,
  | "DISCORD_TOKEN"
  | "APPLICATION_ID"
  | "SYNC_COMMANDS"
  | "SYNC_ON_RELOAD"
  | "DELETE_UNKNOWN_COMMANDS"
  | "DELETE_ON_RELOAD"
  | "SYNC_GUILD_TIMEOUT_MS"
  | "SYNC_GUILD_CONCURRENCY"
  | "KNOWN_GUILD_IDS"
>;

export interface CommandClientOptions {
  config: ClientConfig;
  /** Replaces the REST transport (tests, alternative HTTP layers). */
  transport?: CommandTransport;
  errorSink?: ErrorSink;
  responderFor?: (payload: InvocationPayload) => InteractionResponder | null;
}

export class CommandClient {
  readonly registry = new CommandRegistry();
  readonly syncEngine: CommandSyncEngine;
  readonly dispatcher: DispatchEngine;
  private readonly config: ClientConfig;
  private started = false;

  constructor(options: CommandClientOptions) {
    this.config = options.config;
    const rest = new REST({ version: "10" }).setToken(options.config.DISCORD_TOKEN);
    const transport = options.transport ?? new RestCommandTransport(rest, options.config.APPLICATION_ID);

    this.syncEngine = new CommandSyncEngine(this.registry, transport, {
      deleteUnknown: options.config.DELETE_UNKNOWN_COMMANDS,
      guildTimeoutMs: options.config.SYNC_GUILD_TIMEOUT_MS,
      guildConcurrency: options.config.SYNC_GUILD_CONCURRENCY,
      knownGuildIds: options.config.KNOWN_GUILD_IDS,
    });
    this.dispatcher = new DispatchEngine(this.registry, {
      errorSink: options.errorSink,
      responderFor: options.responderFor ?? ((payload) => new RestInteractionResponder(rest, payload)),
    });
  }

  /** Converges remote commands unless SYNC_COMMANDS is off. */
  async start(): Promise<SyncReport | null> {
    this.started = true;
    if (!this.config.SYNC_COMMANDS) {
      logger.info({ evt: "sync_disabled" }, "[client] command sync disabled; skipping");
      return null;
    }
    return this.syncEngine.sync();
  }

  handle(payload: InvocationPayload): Promise<DispatchOutcome> {
    return this.dispatcher.dispatch(payload);
  }

  async loadUnit(unit: CommandUnit): Promise<RootCommand[]> {
    const nodes = this.registry.loadUnit(unit);
    await this.afterReload();
    return nodes;
  }

  async reloadUnit(unit: CommandUnit): Promise<RootCommand[]> {
    const nodes = this.registry.reloadUnit(unit, { delete: this.config.DELETE_ON_RELOAD });
    await this.afterReload();
    return nodes;
  }

  async unloadUnit(name: string): Promise<UnloadResult> {
    const result = this.registry.unloadUnit(name, { delete: this.config.DELETE_ON_RELOAD });
    await this.afterReload();
    return result;
  }

  /** Before start() there is nothing to converge yet. */
  private async afterReload(): Promise<void> {
    if (!this.started) return;
    if (this.config.SYNC_ON_RELOAD && this.config.SYNC_COMMANDS) {
      await this.syncEngine.sync();
    } else {
      this.syncEngine.rebind();
    }
  }

  async shutdown(): Promise<void> {
    this.registry.clear();
    await flushSentry();
    logger.info({ evt: "client_shutdown" }, "[client] shut down");
  }
}
