/**
 * slash-registry — src/sync/engine.ts
 * WHAT: Converges the remote command set with the registry, global scope first, then each guild.
 * FLOWS:
 *  sync() → syncScope(null) → guild batches: withTimeout(syncScope(guildId, signal)), deadline aborts signal
 *  syncScope: fetch → stageChanges → chooseWriteOperation → write → re-fetch → bind
 *  An aborted pass stops before its next write or bind and leaves no remote state behind
 *  rebind(): re-applies the last fetched remote state without writing (reload path)
 * Failure policy:
 *  - global transport error: thrown at once
 *  - guild missing access / timeout: logged, guild skipped
 *  - other guild errors: collected, thrown together as CommandSyncError after every guild ran
 * DOCS:
 *  - Bulk overwrite: https://discord.com/developers/docs/interactions/application-commands#bulk-overwrite-global-application-commands
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { SnowflakeUtil } from "discord.js";
import type { CommandRegistry } from "../commands/registry.js";
import {
  type CommandPermission,
  GLOBAL_SCOPE,
  commandTypeOf,
  kindOfType,
  type RemoteCommand,
  type ScopeKey,
  scopeKey,
} from "../commands/types.js";
import { CommandSyncError, GuildSyncTimeoutError, isMissingAccess } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { inSpan } from "../lib/sentry.js";
import { withTimeout } from "../lib/timeout.js";
import { type SyncPlan, type WriteOperation, chooseWriteOperation, stageChanges } from "./plan.js";
import type { CommandTransport } from "./transport.js";

export interface SyncEngineOptions {
  /** Delete remote commands that have no local definition. */
  deleteUnknown?: boolean;
  guildTimeoutMs?: number;
  /** Guild passes run in batches of this size; 1 is sequential. */
  guildConcurrency?: number;
  /** Guilds converged even when no local command targets them. */
  knownGuildIds?: readonly string[];
}

export interface ScopeSyncResult {
  guildId: string | null;
  plan: SyncPlan;
  operation: WriteOperation["type"];
  writes: number;
  /** Local nodes bound after the pass. */
  bound: number;
  /** Remote commands left without a local definition. */
  unmanaged: number;
}

export interface SyncReport {
  global: ScopeSyncResult;
  guilds: ScopeSyncResult[];
  skipped: Array<{ guildId: string; reason: string }>;
}

export interface RebindReport {
  bound: number;
  /** Remote commands per scope that no longer exist in code. */
  unmanaged: Array<{ guildId: string | null; names: string[] }>;
}

function guildOf(key: ScopeKey): string | null {
  return key === GLOBAL_SCOPE ? null : key;
}

export class CommandSyncEngine {
  private readonly deleteUnknown: boolean;
  private readonly guildTimeoutMs: number;
  private readonly guildConcurrency: number;
  private readonly knownGuildIds: readonly string[];
  private readonly remoteState = new Map<ScopeKey, RemoteCommand[]>();
  private readonly permissionState = new Map<string, Map<string, CommandPermission[]>>();

  constructor(
    private readonly registry: CommandRegistry,
    private readonly transport: CommandTransport,
    options: SyncEngineOptions = {}
  ) {
    this.deleteUnknown = options.deleteUnknown ?? true;
    this.guildTimeoutMs = options.guildTimeoutMs ?? 10_000;
    this.guildConcurrency = Math.max(1, Math.floor(options.guildConcurrency ?? 1));
    this.knownGuildIds = options.knownGuildIds ?? [];
  }

  /** Last fetched remote list for a scope, if it was synced. */
  snapshot(guildId: string | null): readonly RemoteCommand[] | undefined {
    return this.remoteState.get(scopeKey(guildId));
  }

  async sync(): Promise<SyncReport> {
    return inSpan("commands.sync", async () => {
      const started = Date.now();
      const global = await this.syncScope(null);

      const guildIds = [...new Set([...this.registry.guildIds(), ...this.knownGuildIds])].sort();
      const guilds: ScopeSyncResult[] = [];
      const skipped: SyncReport["skipped"] = [];
      const failures: Array<{ guildId: string; error: unknown }> = [];

      for (let i = 0; i < guildIds.length; i += this.guildConcurrency) {
        const batch = guildIds.slice(i, i + this.guildConcurrency);
        const results = await Promise.allSettled(
          batch.map((guildId) => {
            const controller = new AbortController();
            return withTimeout(
              this.syncScope(guildId, controller.signal),
              this.guildTimeoutMs,
              () => {
                const timeout = new GuildSyncTimeoutError(guildId, this.guildTimeoutMs);
                controller.abort(timeout);
                return timeout;
              },
              `sync guild ${guildId}`
            );
          })
        );

        results.forEach((result, index) => {
          const guildId = batch[index];
          if (result.status === "fulfilled") {
            guilds.push(result.value);
          } else if (isMissingAccess(result.reason)) {
            const reason = result.reason instanceof Error ? result.reason.message : String(result.reason);
            logger.warn({ evt: "sync_guild_skipped", guildId, reason }, `[sync] skipping guild ${guildId}`);
            skipped.push({ guildId, reason });
          } else {
            logger.error({ evt: "sync_guild_failed", guildId, err: result.reason }, `[sync] guild ${guildId} failed`);
            failures.push({ guildId, error: result.reason });
          }
        });
      }

      if (failures.length > 0) {
        throw new CommandSyncError(failures);
      }

      logger.info(
        {
          evt: "sync_complete",
          guilds: guilds.length,
          skipped: skipped.length,
          writes: global.writes + guilds.reduce((sum, g) => sum + g.writes, 0),
          durationMs: Date.now() - started,
        },
        "[sync] application commands converged"
      );
      return { global, guilds, skipped };
    });
  }

  /**
   * One full pass for one scope. Errors propagate to the caller.
   * Once signal aborts, the pass rejects with its reason before the next write, re-fetch or bind.
   */
  async syncScope(guildId: string | null, signal?: AbortSignal): Promise<ScopeSyncResult> {
    const scope = guildId ?? "global";
    const local = this.registry.commandsFor(guildId);
    const remote = await this.transport.fetchCommands(guildId, { signal });
    signal?.throwIfAborted();
    const plan = stageChanges(local, remote);
    const operation = chooseWriteOperation(plan, { deleteUnknown: this.deleteUnknown });

    logger.debug(
      {
        evt: "sync_scope_start",
        scope,
        local: local.length,
        remote: remote.length,
        updates: plan.updates.length,
        creates: plan.creates.length,
        removals: plan.removals.length,
        operation: operation.type,
      },
      `[sync] ${scope}: ${operation.type}`
    );

    const writes = await this.apply(guildId, operation, signal);
    signal?.throwIfAborted();
    const current = writes > 0 ? await this.transport.fetchCommands(guildId, { signal }) : remote;
    const permissions = guildId
      ? await this.transport.fetchPermissions(guildId, { signal })
      : new Map<string, CommandPermission[]>();
    signal?.throwIfAborted();

    this.remoteState.set(scopeKey(guildId), current);
    if (guildId) this.permissionState.set(guildId, permissions);

    const { bound, unmanaged } = this.bindScope(guildId, current, permissions);
    if (unmanaged.length > 0) {
      logger.warn(
        { evt: "sync_unmanaged", scope, names: unmanaged },
        `[sync] ${unmanaged.length} remote command(s) in ${scope} have no local definition`
      );
    }
    return { guildId, plan, operation: operation.type, writes, bound, unmanaged: unmanaged.length };
  }

  private async apply(guildId: string | null, operation: WriteOperation, signal?: AbortSignal): Promise<number> {
    const scope = guildId ?? "global";
    const options = { signal };
    switch (operation.type) {
      case "none":
        return 0;
      case "create":
        logger.info({ evt: "sync_write", scope, op: "create", cmd: operation.node.name }, `[sync] ${scope}: create ${operation.node.name}`);
        await this.transport.createCommand(guildId, operation.command, options);
        return 1;
      case "edit":
        logger.info({ evt: "sync_write", scope, op: "edit", cmd: operation.node.name }, `[sync] ${scope}: edit ${operation.node.name}`);
        await this.transport.editCommand(guildId, operation.commandId, operation.command, options);
        return 1;
      case "bulk":
        logger.info(
          { evt: "sync_write", scope, op: "bulk", count: operation.commands.length },
          `[sync] ${scope}: bulk overwrite with ${operation.commands.length} command(s)`
        );
        await this.transport.bulkOverwriteCommands(guildId, operation.commands, options);
        return 1;
    }
  }

  /**
   * Binds every local node of the scope to its remote entry by (kind, name) and
   * clears bindings of nodes the remote no longer has.
   */
  private bindScope(
    guildId: string | null,
    remote: readonly RemoteCommand[],
    permissions: ReadonlyMap<string, CommandPermission[]>
  ): { bound: number; unmanaged: string[] } {
    const local = this.registry.commandsFor(guildId);
    const claimed = new Set<RemoteCommand>();
    let bound = 0;

    for (const node of local) {
      const entry = remote.find((r) => r.name === node.name && r.type === commandTypeOf(node.commandKind));
      if (!entry) {
        node.unbind(guildId);
        continue;
      }
      claimed.add(entry);
      node.bind({
        id: entry.id,
        applicationId: entry.application_id,
        guildId,
        version: entry.version,
        createdAt: new Date(SnowflakeUtil.timestampFrom(entry.id)),
        permissions: permissions.get(entry.id) ?? [],
      });
      bound += 1;
    }

    // Foreign command types are not reported
    const unmanaged = remote.filter((r) => !claimed.has(r) && kindOfType(r.type) !== null).map((r) => r.name);
    return { bound, unmanaged };
  }

  /**
   * Reload path without a network write: re-applies the last fetched remote lists to the
   * nodes currently in the registry.
   */
  rebind(): RebindReport {
    let bound = 0;
    const unmanaged: RebindReport["unmanaged"] = [];
    for (const [key, remote] of this.remoteState) {
      const guildId = guildOf(key);
      const permissions = guildId ? this.permissionState.get(guildId) : undefined;
      const result = this.bindScope(guildId, remote, permissions ?? new Map<string, CommandPermission[]>());
      bound += result.bound;
      if (result.unmanaged.length > 0) {
        unmanaged.push({ guildId, names: result.unmanaged });
        logger.warn(
          { evt: "rebind_unmanaged", scope: key, names: result.unmanaged },
          `[sync] ${result.unmanaged.length} command(s) in ${key} no longer exist in code`
        );
      }
    }
    logger.info({ evt: "rebind_complete", bound }, "[sync] remote bindings re-applied");
    return { bound, unmanaged };
  }
}
