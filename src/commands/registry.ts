/**
 * slash-registry — src/commands/registry.ts
 * WHAT: Process-wide collection of top-level commands, indexed by scope and command kind.
 * FLOWS:
 *  - slashCommand / subCommand / userCommand / messageCommand → validated node, indexed under every scope it targets
 *  - loadUnit(unit) → unit.register(registrar) → all-or-nothing
 *  - unloadUnit(name) → nodes removed; bound nodes soft-removed (disabled, kept by remote id) unless deleted
 * One logical node per command; a guild-scoped command is indexed once per guild and keeps
 * one remote binding per guild.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { logger } from "../lib/logger.js";
import { CommandValidationError, LIMITS, validateSnowflake } from "../lib/validation.js";
import {
  ContextMenuCommand,
  type ContextMenuInit,
  type GroupInit,
  type PermissionsInit,
  type RootCommand,
  SlashCommand,
  type SlashCommandInit,
  type SubCommand,
  type SubCommandInit,
  type UnitTag,
} from "./nodes.js";
import {
  COMMAND_KINDS,
  type CommandCheck,
  type CommandHandler,
  type CommandKind,
  GLOBAL_SCOPE,
  type ScopeKey,
  scopeKey,
} from "./types.js";
import type { Localizations } from "../lib/validation.js";

export interface SlashCommandRegistration extends SlashCommandInit {
  handler: CommandHandler;
}

/** The top-level container a sub-command lives under. Created on first use. */
export interface ParentInit {
  name: string;
  description?: string;
  nameLocalizations?: Localizations;
  descriptionLocalizations?: Localizations;
  defaultMemberPermissions?: PermissionsInit;
  dmPermission?: boolean;
  nsfw?: boolean;
  checks?: readonly CommandCheck[];
}

export interface SubCommandRegistration extends SubCommandInit {
  parent: ParentInit;
  group?: GroupInit;
  guildIds?: readonly string[];
}

export interface CommandRegistrar {
  slashCommand(init: SlashCommandRegistration): SlashCommand;
  subCommand(init: SubCommandRegistration): SubCommand;
  userCommand(init: ContextMenuInit): ContextMenuCommand;
  messageCommand(init: ContextMenuInit): ContextMenuCommand;
}

/** A reloadable group of registrations with shared checks. */
export interface CommandUnit {
  readonly name: string;
  readonly checks: readonly CommandCheck[];
  register(registrar: CommandRegistrar): void;
}

export function defineUnit(init: {
  name: string;
  checks?: readonly CommandCheck[];
  register: (registrar: CommandRegistrar) => void;
}): CommandUnit {
  if (!init.name.trim()) {
    throw new CommandValidationError("unit name cannot be empty", "unit");
  }
  return { name: init.name, checks: [...(init.checks ?? [])], register: init.register };
}

export interface UnloadResult {
  removed: RootCommand[];
  /** Removed nodes that kept their remote ids (disabled, not deleted). */
  retired: RootCommand[];
}

const DEFAULT_CONTAINER_DESCRIPTION = "No description provided.";

type KindIndex = Record<CommandKind, Map<string, RootCommand>>;

function emptyIndex(): KindIndex {
  return { chat_input: new Map(), user: new Map(), message: new Map() };
}

function limitFor(kind: CommandKind): number {
  return kind === "chat_input" ? LIMITS.CHAT_COMMANDS_PER_SCOPE : LIMITS.CONTEXT_MENU_COMMANDS_PER_SCOPE;
}

function sameScopes(a: readonly string[] | null, b: readonly string[] | null): boolean {
  if (a === null || b === null) return a === b;
  return a.length === b.length && a.every((id, i) => id === b[i]);
}

function normalizedGuildIds(guildIds: readonly string[] | undefined): readonly string[] | null {
  if (guildIds === undefined) return null;
  for (const id of guildIds) validateSnowflake(id, "guildIds");
  return [...new Set(guildIds)].sort();
}

export class CommandRegistry implements CommandRegistrar {
  private readonly scopeIndex = new Map<ScopeKey, KindIndex>();
  private readonly unitNodes = new Map<string, RootCommand[]>();
  private readonly retiredById = new Map<string, RootCommand>();

  // ===== Registration =====

  slashCommand(init: SlashCommandRegistration): SlashCommand {
    return this.registerSlash(init, null, []);
  }

  subCommand(init: SubCommandRegistration): SubCommand {
    return this.registerSub(init, null, []);
  }

  userCommand(init: ContextMenuInit): ContextMenuCommand {
    return this.registerContext("user", init, null, []);
  }

  messageCommand(init: ContextMenuInit): ContextMenuCommand {
    return this.registerContext("message", init, null, []);
  }

  private registerSlash(init: SlashCommandRegistration, unit: UnitTag | null, added: RootCommand[]): SlashCommand {
    const node = new SlashCommand(init);
    this.insert(node, unit, added);
    return node;
  }

  private registerContext(
    kind: "user" | "message",
    init: ContextMenuInit,
    unit: UnitTag | null,
    added: RootCommand[]
  ): ContextMenuCommand {
    const node = new ContextMenuCommand(kind, init);
    this.insert(node, unit, added);
    return node;
  }

  private registerSub(init: SubCommandRegistration, unit: UnitTag | null, added: RootCommand[]): SubCommand {
    const { parent, group, guildIds, ...subInit } = init;
    const scopes = normalizedGuildIds(guildIds);
    const existing = this.findContainer(parent.name, scopes);

    if (!existing) {
      const container = new SlashCommand({
        ...parent,
        description: parent.description ?? DEFAULT_CONTAINER_DESCRIPTION,
        guildIds: scopes ?? undefined,
      });
      const sub = container.addSubCommand(subInit, group);
      this.insert(container, unit, added);
      return sub;
    }

    if (existing.unit?.name !== unit?.name) {
      throw new CommandValidationError(
        `command "${parent.name}" belongs to ${existing.unit ? `unit "${existing.unit.name}"` : "no unit"}`,
        "parent",
        parent.name
      );
    }
    const sub = existing.addSubCommand(subInit, group);
    try {
      existing.merge(parent);
    } catch (err) {
      const group = sub.group;
      if (group) {
        group.children.delete(sub.name);
        if (group.children.size === 0) existing.children.delete(group.name);
      } else {
        existing.children.delete(sub.name);
      }
      throw err;
    }
    return sub;
  }

  /**
   * The container registered under `name` for exactly these scopes, if any.
   * A same-named chat command with a different scope set is a conflict.
   */
  private findContainer(name: string, scopes: readonly string[] | null): SlashCommand | null {
    const keys = scopes ?? [GLOBAL_SCOPE];
    let found: SlashCommand | null = null;
    for (const key of keys) {
      const node = this.scopeIndex.get(key)?.chat_input.get(name);
      if (!node) continue;
      if (node.kind !== "slash" || !sameScopes(node.guildIds, scopes)) {
        throw new CommandValidationError(
          `command "${name}" is already registered with a different scope`,
          "guildIds",
          name
        );
      }
      found = node;
    }
    return found;
  }

  /** Validates every target scope first, then indexes the node under each. */
  private insert(node: RootCommand, unit: UnitTag | null, added: RootCommand[]): void {
    const scopes = node.scopes();
    for (const key of scopes) {
      const slice = this.scopeIndex.get(key)?.[node.commandKind];
      if (slice?.has(node.name)) {
        throw new CommandValidationError(
          `${node.commandKind} command "${node.name}" is already registered in scope ${key}`,
          "name",
          node.name
        );
      }
      const limit = limitFor(node.commandKind);
      if ((slice?.size ?? 0) >= limit) {
        throw new CommandValidationError(
          `scope ${key} already has ${limit} ${node.commandKind} commands`,
          "name",
          node.name
        );
      }
    }

    for (const key of scopes) {
      let index = this.scopeIndex.get(key);
      if (!index) {
        index = emptyIndex();
        this.scopeIndex.set(key, index);
      }
      index[node.commandKind].set(node.name, node);
    }
    node.unit = unit;
    added.push(node);
    // A unit's twins are dropped once the whole unit has loaded
    if (!unit) this.dropRetiredTwins(node);
    logger.debug(
      { evt: "command_registered", cmd: node.name, kind: node.commandKind, scopes, unit: unit?.name },
      `[registry] registered ${node.name}`
    );
  }

  /** A re-registered command replaces the retired node it used to be. */
  private dropRetiredTwins(node: RootCommand): void {
    const scopes = new Set(node.scopes());
    for (const [id, retired] of this.retiredById) {
      if (
        retired.commandKind === node.commandKind &&
        retired.name === node.name &&
        retired.scopes().some((key) => scopes.has(key))
      ) {
        this.retiredById.delete(id);
      }
    }
  }

  private remove(node: RootCommand): void {
    for (const key of node.scopes()) {
      const index = this.scopeIndex.get(key);
      if (index?.[node.commandKind].get(node.name) === node) {
        index[node.commandKind].delete(node.name);
      }
    }
  }

  // ===== Units =====

  hasUnit(name: string): boolean {
    return this.unitNodes.has(name);
  }

  unitNames(): string[] {
    return [...this.unitNodes.keys()];
  }

  /** Runs the unit's registrations. If any throws, none of them stay registered. */
  loadUnit(unit: CommandUnit): RootCommand[] {
    if (this.unitNodes.has(unit.name)) {
      throw new CommandValidationError(`unit "${unit.name}" is already loaded`, "unit", unit.name);
    }
    const tag: UnitTag = { name: unit.name, checks: unit.checks };
    const added: RootCommand[] = [];
    const registrar: CommandRegistrar = {
      slashCommand: (init) => this.registerSlash(init, tag, added),
      subCommand: (init) => this.registerSub(init, tag, added),
      userCommand: (init) => this.registerContext("user", init, tag, added),
      messageCommand: (init) => this.registerContext("message", init, tag, added),
    };

    try {
      unit.register(registrar);
    } catch (err) {
      for (const node of added) this.remove(node);
      logger.warn({ evt: "unit_load_failed", unit: unit.name, err }, `[registry] unit ${unit.name} failed to load`);
      throw err;
    }

    for (const node of added) this.dropRetiredTwins(node);
    this.unitNodes.set(unit.name, added);
    logger.info({ evt: "unit_loaded", unit: unit.name, commands: added.length }, `[registry] loaded unit ${unit.name}`);
    return [...added];
  }

  /**
   * Removes a unit's commands. Without `delete`, commands that were ever bound are
   * disabled and stay reachable by remote id so the remote set is left untouched.
   */
  unloadUnit(name: string, options: { delete?: boolean } = {}): UnloadResult {
    const nodes = this.unitNodes.get(name);
    if (!nodes) {
      throw new CommandValidationError(`unit "${name}" is not loaded`, "unit", name);
    }
    const retired: RootCommand[] = [];
    for (const node of nodes) {
      this.remove(node);
      const bindings = node.allBindings();
      if (!options.delete && bindings.length > 0) {
        node.disable();
        for (const binding of bindings) this.retiredById.set(binding.id, node);
        retired.push(node);
      }
    }
    this.unitNodes.delete(name);
    logger.info(
      { evt: "unit_unloaded", unit: name, removed: nodes.length, retired: retired.length },
      `[registry] unloaded unit ${name}`
    );
    return { removed: [...nodes], retired };
  }

  reloadUnit(unit: CommandUnit, options: { delete?: boolean } = {}): RootCommand[] {
    if (this.unitNodes.has(unit.name)) this.unloadUnit(unit.name, options);
    return this.loadUnit(unit);
  }

  // ===== Lookups =====

  get(kind: CommandKind, name: string, guildId: string | null): RootCommand | undefined {
    return this.scopeIndex.get(scopeKey(guildId))?.[kind].get(name);
  }

  /** Live nodes first, then soft-removed ones. */
  getById(id: string): RootCommand | undefined {
    for (const node of this.all()) {
      if (node.allBindings().some((b) => b.id === id)) return node;
    }
    return this.retiredById.get(id);
  }

  commandsFor(guildId: string | null, kind?: CommandKind): RootCommand[] {
    const index = this.scopeIndex.get(scopeKey(guildId));
    if (!index) return [];
    const kinds = kind ? [kind] : COMMAND_KINDS;
    return kinds.flatMap((k) => [...index[k].values()]);
  }

  /** Guilds that at least one command targets. */
  guildIds(): string[] {
    return [...this.scopeIndex.entries()]
      .filter(([key, index]) => key !== GLOBAL_SCOPE && COMMAND_KINDS.some((k) => index[k].size > 0))
      .map(([key]) => key);
  }

  all(): RootCommand[] {
    const seen = new Set<RootCommand>();
    for (const index of this.scopeIndex.values()) {
      for (const kind of COMMAND_KINDS) {
        for (const node of index[kind].values()) seen.add(node);
      }
    }
    return [...seen];
  }

  retired(): RootCommand[] {
    return [...new Set(this.retiredById.values())];
  }

  clear(): void {
    this.scopeIndex.clear();
    this.unitNodes.clear();
    this.retiredById.clear();
  }
}
