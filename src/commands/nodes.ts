/**
 * slash-registry — src/commands/nodes.ts
 * WHAT: The command tree. Four node variants discriminated by `kind`:
 *  - "slash":   top-level chat command; a leaf (options + handler) or a container (children)
 *  - "group":   sub-command group under a slash container
 *  - "sub":     sub-command under a slash container or a group
 *  - "context": user or message context-menu command
 * Top-level nodes ("slash", "context") own their remote bindings, one per scope.
 * DOCS:
 *  - Sub-commands and groups: https://discord.com/developers/docs/interactions/application-commands#subcommands-and-subcommand-groups
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { ApplicationCommandOptionType, ApplicationCommandType } from "discord.js";
import {
  CommandValidationError,
  LIMITS,
  type Localizations,
  assertUniqueNames,
  validateChatName,
  validateContextMenuName,
  validateDescription,
  validateLocalizations,
  validateSnowflake,
} from "../lib/validation.js";
import { commandsEqual } from "./equality.js";
import { answerWithoutHandler, runInvocation } from "./invoke.js";
import { CommandOption, type OptionInit, localizationsToWire } from "./option.js";
import {
  type AutocompleteHandler,
  type CommandArgs,
  type CommandCheck,
  type CommandErrorHandler,
  type CommandHandler,
  type CommandKind,
  type CommandWire,
  type ErrorSink,
  type InvocationContext,
  type InvokeOutcome,
  type OptionWire,
  type RemoteBinding,
  type ScopeKey,
  scopeKey,
} from "./types.js";

export type TreeNode = SlashCommand | SubCommandGroup | SubCommand | ContextMenuCommand;
export type RootCommand = SlashCommand | ContextMenuCommand;
export type InvocableNode = SlashCommand | SubCommand | ContextMenuCommand;

/** The reloadable unit a top-level command was registered by. */
export interface UnitTag {
  readonly name: string;
  readonly checks: readonly CommandCheck[];
}

export type PermissionsInit = bigint | string | null;

interface RootInit {
  defaultMemberPermissions?: PermissionsInit;
  /** Ignored for guild-scoped commands. Defaults to true. */
  dmPermission?: boolean;
  nsfw?: boolean;
  /** Absent: global. Present: one binding per listed guild. */
  guildIds?: readonly string[];
  checks?: readonly CommandCheck[];
}

interface TextInit {
  name: string;
  description: string;
  nameLocalizations?: Localizations;
  descriptionLocalizations?: Localizations;
}

interface LeafInit {
  options?: readonly (CommandOption | OptionInit)[];
  /** Handler parameter name → option name, for options whose names make poor identifiers. */
  connectors?: Readonly<Record<string, string>>;
  autocomplete?: AutocompleteHandler;
  onError?: CommandErrorHandler;
}

export interface SlashCommandInit extends RootInit, TextInit, LeafInit {
  handler?: CommandHandler;
}

export interface SubCommandInit extends TextInit, LeafInit {
  handler: CommandHandler;
  checks?: readonly CommandCheck[];
}

export interface GroupInit extends TextInit {
  checks?: readonly CommandCheck[];
}

export interface ContextMenuInit extends RootInit {
  name: string;
  nameLocalizations?: Localizations;
  handler: CommandHandler;
  onError?: CommandErrorHandler;
}

// ===== Shared helpers =====

function normalizePermissions(value: PermissionsInit | undefined): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value === "bigint") {
    if (value < 0n) {
      throw new CommandValidationError("defaultMemberPermissions cannot be negative", "default_member_permissions", value);
    }
    return value.toString();
  }
  if (!/^\d+$/.test(value)) {
    throw new CommandValidationError(
      `defaultMemberPermissions must be a decimal bitmask, got "${value}"`,
      "default_member_permissions",
      value
    );
  }
  return BigInt(value).toString();
}

function normalizeGuildIds(guildIds: readonly string[] | undefined): readonly string[] | null {
  if (guildIds === undefined) return null;
  if (guildIds.length === 0) {
    throw new CommandValidationError("guildIds cannot be empty; omit it for a global command", "guildIds");
  }
  for (const id of guildIds) validateSnowflake(id, "guildIds");
  return [...new Set(guildIds)].sort();
}

function buildOptions(options: readonly (CommandOption | OptionInit)[] | undefined, owner: string): CommandOption[] {
  const built = (options ?? []).map((o) => (o instanceof CommandOption ? o : new CommandOption(o)));
  if (built.length > LIMITS.OPTIONS_MAX) {
    throw new CommandValidationError(
      `${owner} has ${built.length} options; at most ${LIMITS.OPTIONS_MAX} are allowed`,
      "options",
      built.length
    );
  }
  assertUniqueNames(
    built.map((o) => o.name),
    `${owner} options`
  );
  let seenOptional = false;
  for (const option of built) {
    if (!option.required) seenOptional = true;
    else if (seenOptional) {
      throw new CommandValidationError(
        `${owner}: required option "${option.name}" must come before optional ones`,
        "options",
        option.name
      );
    }
  }
  return built;
}

/** Inverts param → option into option → param, checking every target exists. */
function buildConnectors(
  connectors: Readonly<Record<string, string>> | undefined,
  options: readonly CommandOption[],
  owner: string
): ReadonlyMap<string, string> {
  const byOption = new Map<string, string>();
  for (const [param, optionName] of Object.entries(connectors ?? {})) {
    if (!options.some((o) => o.name === optionName)) {
      throw new CommandValidationError(
        `${owner}: connector "${param}" points at unknown option "${optionName}"`,
        "connectors",
        optionName
      );
    }
    if (byOption.has(optionName)) {
      throw new CommandValidationError(`${owner}: option "${optionName}" is connected twice`, "connectors", optionName);
    }
    byOption.set(optionName, param);
  }
  return byOption;
}

function validateText(init: TextInit, owner: string): void {
  validateChatName(init.name, `${owner} name`);
  validateDescription(init.description, `${owner} description`);
  validateLocalizations(init.nameLocalizations, "chat_name", `${owner} name_localizations`);
  validateLocalizations(init.descriptionLocalizations, "description", `${owner} description_localizations`);
}

function textToWire(node: {
  name: string;
  description: string;
  nameLocalizations: Localizations | undefined;
  descriptionLocalizations: Localizations | undefined;
}): Pick<OptionWire, "name" | "description" | "name_localizations" | "description_localizations"> {
  const out: Pick<OptionWire, "name" | "description" | "name_localizations" | "description_localizations"> = {
    name: node.name,
    description: node.description,
  };
  const nameLocalizations = localizationsToWire(node.nameLocalizations);
  if (nameLocalizations) out.name_localizations = nameLocalizations;
  const descriptionLocalizations = localizationsToWire(node.descriptionLocalizations);
  if (descriptionLocalizations) out.description_localizations = descriptionLocalizations;
  return out;
}

// ===== Top-level base =====

abstract class RootCommandBase {
  readonly guildIds: readonly string[] | null;
  readonly checks: CommandCheck[];
  defaultMemberPermissions: string | null;
  dmPermission: boolean;
  nsfw: boolean;
  unit: UnitTag | null = null;
  disabled = false;
  private readonly bindings = new Map<ScopeKey, RemoteBinding>();

  protected constructor(init: RootInit) {
    this.defaultMemberPermissions = normalizePermissions(init.defaultMemberPermissions);
    this.dmPermission = init.dmPermission ?? true;
    this.nsfw = init.nsfw ?? false;
    this.guildIds = normalizeGuildIds(init.guildIds);
    this.checks = [...(init.checks ?? [])];
  }

  abstract readonly name: string;
  abstract readonly commandKind: CommandKind;

  get isGlobal(): boolean {
    return this.guildIds === null;
  }

  /** Scope keys this node is registered under. */
  scopes(): ScopeKey[] {
    return this.guildIds ? [...this.guildIds] : [scopeKey(null)];
  }

  bind(binding: RemoteBinding): void {
    this.bindings.set(scopeKey(binding.guildId), binding);
  }

  unbind(guildId: string | null): void {
    this.bindings.delete(scopeKey(guildId));
  }

  binding(guildId: string | null): RemoteBinding | undefined {
    return this.bindings.get(scopeKey(guildId));
  }

  allBindings(): RemoteBinding[] {
    return [...this.bindings.values()];
  }

  addCheck(check: CommandCheck): this {
    this.checks.push(check);
    return this;
  }

  protected rootChecks(): CommandCheck[] {
    return [...(this.unit?.checks ?? []), ...this.checks];
  }

  /** Common top-level wire fields. dm_permission only exists for global commands. */
  protected metaToWire(): Pick<CommandWire, "default_member_permissions" | "dm_permission" | "nsfw"> {
    const meta: Pick<CommandWire, "default_member_permissions" | "dm_permission" | "nsfw"> = {
      default_member_permissions: this.defaultMemberPermissions,
      nsfw: this.nsfw,
    };
    if (this.isGlobal) meta.dm_permission = this.dmPermission;
    return meta;
  }

  /** Applies the defined fields of a later registration of the same command. */
  protected mergeMeta(init: RootInit): void {
    const permissions =
      init.defaultMemberPermissions !== undefined ? normalizePermissions(init.defaultMemberPermissions) : undefined;
    if (permissions !== undefined) this.defaultMemberPermissions = permissions;
    if (init.dmPermission !== undefined) this.dmPermission = init.dmPermission;
    if (init.nsfw !== undefined) this.nsfw = init.nsfw;
    for (const check of init.checks ?? []) {
      if (!this.checks.includes(check)) this.checks.push(check);
    }
  }

  abstract toWire(): CommandWire;

  equals(remote: CommandWire): boolean {
    return commandsEqual(this.toWire(), remote);
  }
}

// ===== Slash command =====

export class SlashCommand extends RootCommandBase {
  readonly kind = "slash" as const;
  readonly commandKind = "chat_input" as const;
  readonly name: string;
  description: string;
  nameLocalizations: Localizations | undefined;
  descriptionLocalizations: Localizations | undefined;
  readonly options: readonly CommandOption[];
  readonly connectors: ReadonlyMap<string, string>;
  readonly children = new Map<string, SubCommand | SubCommandGroup>();
  handler: CommandHandler | null;
  autocompleteHandler: AutocompleteHandler | null;
  errorHandler: CommandErrorHandler | null;

  constructor(init: SlashCommandInit) {
    super(init);
    validateText(init, `command "${init.name}"`);
    this.name = init.name;
    this.description = init.description;
    this.nameLocalizations = init.nameLocalizations;
    this.descriptionLocalizations = init.descriptionLocalizations;
    this.options = buildOptions(init.options, `command "${init.name}"`);
    this.connectors = buildConnectors(init.connectors, this.options, `command "${init.name}"`);
    this.handler = init.handler ?? null;
    this.autocompleteHandler = init.autocomplete ?? null;
    this.errorHandler = init.onError ?? null;
  }

  get qualifiedName(): string {
    return this.name;
  }

  get isContainer(): boolean {
    return this.children.size > 0;
  }

  get root(): SlashCommand {
    return this;
  }

  /**
   * Adds a sub-command directly or inside `group`, creating the group on first use.
   * Nothing is changed when validation fails.
   */
  addSubCommand(init: SubCommandInit, group?: GroupInit): SubCommand {
    if (this.options.length > 0 || this.handler) {
      throw new CommandValidationError(
        `command "${this.name}" has its own options or handler and cannot take sub-commands`,
        "children",
        init.name
      );
    }

    if (!group) {
      if (this.children.has(init.name)) {
        throw new CommandValidationError(`command "${this.name}" already has a child "${init.name}"`, "children", init.name);
      }
      this.assertRoomForChild();
      const sub = new SubCommand(init, this);
      this.children.set(sub.name, sub);
      return sub;
    }

    const existing = this.children.get(group.name);
    if (existing instanceof SubCommand) {
      throw new CommandValidationError(
        `command "${this.name}" has a sub-command named "${group.name}", not a group`,
        "children",
        group.name
      );
    }
    if (existing) {
      const sub = existing.addSubCommand(init);
      try {
        existing.merge(group);
      } catch (err) {
        existing.children.delete(sub.name);
        throw err;
      }
      return sub;
    }
    this.assertRoomForChild();
    const created = new SubCommandGroup(this, group, init);
    this.children.set(created.name, created);
    return created.firstChild;
  }

  /** Takes the defined text and flags from a later registration of this container. */
  merge(init: Partial<TextInit> & RootInit): void {
    if (init.description !== undefined) validateDescription(init.description, `command "${this.name}" description`);
    validateLocalizations(init.nameLocalizations, "chat_name", `command "${this.name}" name_localizations`);
    validateLocalizations(init.descriptionLocalizations, "description", `command "${this.name}" description_localizations`);
    this.mergeMeta(init);
    if (init.description !== undefined) this.description = init.description;
    if (init.nameLocalizations !== undefined) this.nameLocalizations = init.nameLocalizations;
    if (init.descriptionLocalizations !== undefined) this.descriptionLocalizations = init.descriptionLocalizations;
  }

  private assertRoomForChild(): void {
    if (this.children.size >= LIMITS.CHILDREN_MAX) {
      throw new CommandValidationError(
        `command "${this.name}" already has ${LIMITS.CHILDREN_MAX} sub-commands/groups`,
        "children"
      );
    }
  }

  setErrorHandler(handler: CommandErrorHandler): this {
    this.errorHandler = handler;
    return this;
  }

  setAutocompleteHandler(handler: AutocompleteHandler): this {
    this.autocompleteHandler = handler;
    return this;
  }

  effectiveChecks(): CommandCheck[] {
    return this.rootChecks();
  }

  resolveErrorHandler(): CommandErrorHandler | null {
    return this.errorHandler;
  }

  paramFor(optionName: string): string {
    return this.connectors.get(optionName) ?? optionName;
  }

  /** Soft removal: stays addressable by remote id, never invocable again. */
  disable(): void {
    this.disabled = true;
    this.handler = null;
    this.autocompleteHandler = null;
    for (const child of this.children.values()) child.disable();
  }

  toWire(): CommandWire {
    const wire: CommandWire = {
      type: ApplicationCommandType.ChatInput,
      ...textToWire(this),
      ...this.metaToWire(),
    };
    if (this.isContainer) {
      wire.options = [...this.children.values()].map((child) => child.toWire());
    } else if (this.options.length > 0) {
      wire.options = this.options.map((o) => o.toWire());
    }
    return wire;
  }

  async invoke(ctx: InvocationContext, args: CommandArgs, sink: ErrorSink): Promise<InvokeOutcome> {
    const handler = this.handler;
    if (!handler) return "noop";
    return runInvocation(this, ctx, sink, () => handler(ctx, args));
  }

  async invokeAutocomplete(ctx: InvocationContext, args: CommandArgs, sink: ErrorSink): Promise<InvokeOutcome> {
    const handler = this.autocompleteHandler;
    if (!handler) return answerWithoutHandler(this, ctx);
    return runInvocation(this, ctx, sink, () => handler(ctx, args));
  }
}

// ===== Sub-command group =====

export class SubCommandGroup {
  readonly kind = "group" as const;
  readonly name: string;
  description: string;
  nameLocalizations: Localizations | undefined;
  descriptionLocalizations: Localizations | undefined;
  readonly parent: SlashCommand;
  readonly children = new Map<string, SubCommand>();
  readonly checks: CommandCheck[];
  errorHandler: CommandErrorHandler | null = null;
  readonly firstChild: SubCommand;

  /** A group never exists without at least one sub-command. */
  constructor(parent: SlashCommand, init: GroupInit, firstChild: SubCommandInit) {
    validateText(init, `group "${parent.name} ${init.name}"`);
    this.parent = parent;
    this.name = init.name;
    this.description = init.description;
    this.nameLocalizations = init.nameLocalizations;
    this.descriptionLocalizations = init.descriptionLocalizations;
    this.checks = [...(init.checks ?? [])];
    this.firstChild = new SubCommand(firstChild, this);
    this.children.set(this.firstChild.name, this.firstChild);
  }

  get qualifiedName(): string {
    return `${this.parent.name} ${this.name}`;
  }

  get root(): SlashCommand {
    return this.parent;
  }

  addSubCommand(init: SubCommandInit): SubCommand {
    if (this.children.has(init.name)) {
      throw new CommandValidationError(`group "${this.qualifiedName}" already has "${init.name}"`, "children", init.name);
    }
    if (this.children.size >= LIMITS.CHILDREN_MAX) {
      throw new CommandValidationError(
        `group "${this.qualifiedName}" already has ${LIMITS.CHILDREN_MAX} sub-commands`,
        "children"
      );
    }
    const sub = new SubCommand(init, this);
    this.children.set(sub.name, sub);
    return sub;
  }

  merge(init: GroupInit): void {
    if (init.name !== this.name) return;
    validateDescription(init.description, `group "${this.qualifiedName}" description`);
    validateLocalizations(init.nameLocalizations, "chat_name", `group "${this.qualifiedName}" name_localizations`);
    validateLocalizations(init.descriptionLocalizations, "description", `group "${this.qualifiedName}" description_localizations`);
    this.description = init.description;
    if (init.nameLocalizations !== undefined) this.nameLocalizations = init.nameLocalizations;
    if (init.descriptionLocalizations !== undefined) this.descriptionLocalizations = init.descriptionLocalizations;
    for (const check of init.checks ?? []) {
      if (!this.checks.includes(check)) this.checks.push(check);
    }
  }

  setErrorHandler(handler: CommandErrorHandler): this {
    this.errorHandler = handler;
    return this;
  }

  addCheck(check: CommandCheck): this {
    this.checks.push(check);
    return this;
  }

  disable(): void {
    for (const child of this.children.values()) child.disable();
  }

  toWire(): OptionWire {
    return {
      type: ApplicationCommandOptionType.SubcommandGroup,
      ...textToWire(this),
      options: [...this.children.values()].map((child) => child.toWire()),
    };
  }
}

// ===== Sub-command =====

export class SubCommand {
  readonly kind = "sub" as const;
  readonly name: string;
  readonly description: string;
  readonly nameLocalizations: Localizations | undefined;
  readonly descriptionLocalizations: Localizations | undefined;
  readonly parent: SlashCommand | SubCommandGroup;
  readonly options: readonly CommandOption[];
  readonly connectors: ReadonlyMap<string, string>;
  readonly checks: CommandCheck[];
  handler: CommandHandler | null;
  autocompleteHandler: AutocompleteHandler | null;
  errorHandler: CommandErrorHandler | null;

  constructor(init: SubCommandInit, parent: SlashCommand | SubCommandGroup) {
    const owner = `sub-command "${parent.qualifiedName} ${init.name}"`;
    validateText(init, owner);
    this.parent = parent;
    this.name = init.name;
    this.description = init.description;
    this.nameLocalizations = init.nameLocalizations;
    this.descriptionLocalizations = init.descriptionLocalizations;
    this.options = buildOptions(init.options, owner);
    this.connectors = buildConnectors(init.connectors, this.options, owner);
    this.checks = [...(init.checks ?? [])];
    this.handler = init.handler;
    this.autocompleteHandler = init.autocomplete ?? null;
    this.errorHandler = init.onError ?? null;
  }

  get qualifiedName(): string {
    return `${this.parent.qualifiedName} ${this.name}`;
  }

  get root(): SlashCommand {
    return this.parent.root;
  }

  get group(): SubCommandGroup | null {
    return this.parent.kind === "group" ? this.parent : null;
  }

  setErrorHandler(handler: CommandErrorHandler): this {
    this.errorHandler = handler;
    return this;
  }

  setAutocompleteHandler(handler: AutocompleteHandler): this {
    this.autocompleteHandler = handler;
    return this;
  }

  addCheck(check: CommandCheck): this {
    this.checks.push(check);
    return this;
  }

  /** unit → command → group → sub-command */
  effectiveChecks(): CommandCheck[] {
    return [...this.root.effectiveChecks(), ...(this.group?.checks ?? []), ...this.checks];
  }

  resolveErrorHandler(): CommandErrorHandler | null {
    return this.errorHandler ?? this.group?.errorHandler ?? this.root.errorHandler;
  }

  paramFor(optionName: string): string {
    return this.connectors.get(optionName) ?? optionName;
  }

  disable(): void {
    this.handler = null;
    this.autocompleteHandler = null;
  }

  toWire(): OptionWire {
    const wire: OptionWire = {
      type: ApplicationCommandOptionType.Subcommand,
      ...textToWire(this),
    };
    if (this.options.length > 0) wire.options = this.options.map((o) => o.toWire());
    return wire;
  }

  async invoke(ctx: InvocationContext, args: CommandArgs, sink: ErrorSink): Promise<InvokeOutcome> {
    const handler = this.handler;
    if (!handler) return "noop";
    return runInvocation(this, ctx, sink, () => handler(ctx, args));
  }

  async invokeAutocomplete(ctx: InvocationContext, args: CommandArgs, sink: ErrorSink): Promise<InvokeOutcome> {
    const handler = this.autocompleteHandler;
    if (!handler) return answerWithoutHandler(this, ctx);
    return runInvocation(this, ctx, sink, () => handler(ctx, args));
  }
}

// ===== Context menu =====

export class ContextMenuCommand extends RootCommandBase {
  readonly kind = "context" as const;
  readonly commandKind: "user" | "message";
  readonly name: string;
  readonly nameLocalizations: Localizations | undefined;
  handler: CommandHandler | null;
  errorHandler: CommandErrorHandler | null;

  constructor(commandKind: "user" | "message", init: ContextMenuInit) {
    super(init);
    validateContextMenuName(init.name, `${commandKind} command name`);
    validateLocalizations(init.nameLocalizations, "context_name", `${commandKind} command "${init.name}" name_localizations`);
    this.commandKind = commandKind;
    this.name = init.name;
    this.nameLocalizations = init.nameLocalizations;
    this.handler = init.handler;
    this.errorHandler = init.onError ?? null;
  }

  get qualifiedName(): string {
    return this.name;
  }

  setErrorHandler(handler: CommandErrorHandler): this {
    this.errorHandler = handler;
    return this;
  }

  effectiveChecks(): CommandCheck[] {
    return this.rootChecks();
  }

  resolveErrorHandler(): CommandErrorHandler | null {
    return this.errorHandler;
  }

  disable(): void {
    this.disabled = true;
    this.handler = null;
  }

  toWire(): CommandWire {
    const wire: CommandWire = {
      type: this.commandKind === "user" ? ApplicationCommandType.User : ApplicationCommandType.Message,
      name: this.name,
      // Context menu commands carry an empty description on the wire
      description: "",
      ...this.metaToWire(),
    };
    const nameLocalizations = localizationsToWire(this.nameLocalizations);
    if (nameLocalizations) wire.name_localizations = nameLocalizations;
    return wire;
  }

  async invoke(ctx: InvocationContext, args: CommandArgs, sink: ErrorSink): Promise<InvokeOutcome> {
    const handler = this.handler;
    if (!handler) return "noop";
    return runInvocation(this, ctx, sink, () => handler(ctx, args));
  }

  async invokeAutocomplete(ctx: InvocationContext, _args: CommandArgs, _sink: ErrorSink): Promise<InvokeOutcome> {
    return answerWithoutHandler(this, ctx);
  }
}
