/**
 * slash-registry — src/commands/types.ts
 * WHAT: Wire shapes, handler signatures and the invocation context shared by the command tree,
 *       the sync engine and the dispatch engine.
 * DOCS:
 *  - Application command object: https://discord.com/developers/docs/interactions/application-commands#application-command-object
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { ApplicationCommandType } from "discord.js";
import type { InvocationPayload, ResolvedValue } from "../dispatch/payload.js";
import type { InteractionResponder } from "../dispatch/responder.js";
import type { TreeNode } from "./nodes.js";

// ===== Wire shapes =====

/** Locale → text. The platform sends null for cleared entries. */
export type WireLocalizations = Record<string, string | null>;

export interface ChoiceWire {
  name: string;
  name_localizations?: WireLocalizations | null;
  value: string | number;
}

/**
 * One entry of an `options` array: a scalar option, a sub-command or a group.
 * Exactly one of choices/autocomplete/options is present.
 */
export interface OptionWire {
  type: number;
  name: string;
  name_localizations?: WireLocalizations | null;
  description: string;
  description_localizations?: WireLocalizations | null;
  required?: boolean;
  choices?: ChoiceWire[];
  autocomplete?: boolean;
  min_value?: number;
  max_value?: number;
  channel_types?: number[];
  options?: OptionWire[];
}

export type CommandWire = {
  type: number;
  name: string;
  name_localizations?: WireLocalizations | null;
  description: string;
  description_localizations?: WireLocalizations | null;
  default_member_permissions?: string | null;
  /** Omitted for guild-scoped commands. */
  dm_permission?: boolean;
  nsfw?: boolean;
  options?: OptionWire[];
};

/** A command as returned by the remote fetch. */
export interface RemoteCommand extends CommandWire {
  id: string;
  application_id: string;
  guild_id?: string;
  version: string;
  /** Fields not modelled here, kept as received. */
  [field: string]: unknown;
}

/** A wire entry that keeps its remote id, as sent in a bulk overwrite. */
export type IdentifiedCommandWire = CommandWire & { id?: string; [field: string]: unknown };

// ===== Kinds and scopes =====

export type CommandKind = "chat_input" | "user" | "message";

export const COMMAND_KINDS: readonly CommandKind[] = ["chat_input", "user", "message"];

export function commandTypeOf(kind: CommandKind): ApplicationCommandType {
  switch (kind) {
    case "chat_input":
      return ApplicationCommandType.ChatInput;
    case "user":
      return ApplicationCommandType.User;
    case "message":
      return ApplicationCommandType.Message;
  }
}

/** Maps a wire `type` back to a kind; null for types this registry does not manage. */
export function kindOfType(type: number): CommandKind | null {
  switch (type) {
    case ApplicationCommandType.ChatInput:
      return "chat_input";
    case ApplicationCommandType.User:
      return "user";
    case ApplicationCommandType.Message:
      return "message";
    default:
      return null;
  }
}

/** Key of one scope slice: a guild id, or "global". */
export type ScopeKey = string;
export const GLOBAL_SCOPE: ScopeKey = "global";

export function scopeKey(guildId: string | null): ScopeKey {
  return guildId ?? GLOBAL_SCOPE;
}

// ===== Remote binding =====

export interface CommandPermission {
  id: string;
  type: number;
  permission: boolean;
}

/** What the sync engine learns about a node in one scope. */
export interface RemoteBinding {
  id: string;
  applicationId: string;
  guildId: string | null;
  version: string;
  createdAt: Date;
  permissions: readonly CommandPermission[];
}

// ===== Handlers =====

export type CommandArgs = Record<string, ResolvedValue>;

export interface FocusedOption {
  name: string;
  value: string | number | boolean;
}

export interface InvocationContext {
  readonly payload: InvocationPayload;
  /** Null only while routing has not found a node yet. */
  readonly command: TreeNode | null;
  readonly guildId: string | null;
  readonly userId: string | null;
  readonly locale: string | null;
  readonly isAutocomplete: boolean;
  /** Set for autocomplete invocations. */
  readonly focused: FocusedOption | null;
  readonly traceId: string;
  readonly responder: InteractionResponder | null;
}

export type CommandHandler = (ctx: InvocationContext, args: CommandArgs) => unknown;
export type AutocompleteHandler = (ctx: InvocationContext, args: CommandArgs) => unknown;
export type CommandErrorHandler = (ctx: InvocationContext, error: unknown) => unknown;
export type CommandCheck = (ctx: InvocationContext) => boolean | Promise<boolean>;

/** Process-wide sink for failures no node-level handler took. */
export type ErrorSink = (node: TreeNode | null, ctx: InvocationContext, error: unknown) => void | Promise<void>;

export type InvokeOutcome = "completed" | "check_failed" | "errored" | "noop";
