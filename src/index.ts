/**
 * slash-registry — src/index.ts
 * WHAT: Public surface: command model, registry, sync and dispatch engines, client, ambient helpers.
 * USAGE:
 *  const client = new CommandClient({ config: loadEnv() });
 *  client.registry.slashCommand({ name: "ping", description: "Replies with pong", handler: (ctx) => ctx.responder?.reply("pong") });
 *  await client.start();
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
export { CommandOption, type ChoiceInit, type OptionDefault, type OptionInit, type ScalarOptionType } from "./commands/option.js";
export {
  ContextMenuCommand,
  SlashCommand,
  SubCommand,
  SubCommandGroup,
  type ContextMenuInit,
  type GroupInit,
  type InvocableNode,
  type RootCommand,
  type SlashCommandInit,
  type SubCommandInit,
  type TreeNode,
} from "./commands/nodes.js";
export {
  CommandRegistry,
  defineUnit,
  type CommandRegistrar,
  type CommandUnit,
  type ParentInit,
  type SlashCommandRegistration,
  type SubCommandRegistration,
  type UnloadResult,
} from "./commands/registry.js";
export { commandsEqual, optionListsEqual } from "./commands/equality.js";
export { formatCommandTree } from "./commands/format.js";
export {
  COMMAND_KINDS,
  GLOBAL_SCOPE,
  commandTypeOf,
  kindOfType,
  scopeKey,
  type AutocompleteHandler,
  type ChoiceWire,
  type CommandArgs,
  type CommandCheck,
  type CommandErrorHandler,
  type CommandHandler,
  type CommandKind,
  type CommandPermission,
  type CommandWire,
  type ErrorSink,
  type FocusedOption,
  type IdentifiedCommandWire,
  type InvocationContext,
  type InvokeOutcome,
  type OptionWire,
  type RemoteBinding,
  type RemoteCommand,
  type ScopeKey,
} from "./commands/types.js";

export { CommandSyncEngine, type RebindReport, type ScopeSyncResult, type SyncEngineOptions, type SyncReport } from "./sync/engine.js";
export { chooseWriteOperation, stageChanges, remoteToWire, type SyncPlan, type WriteOperation } from "./sync/plan.js";
export { RestCommandTransport, type CommandTransport } from "./sync/transport.js";

export { DispatchEngine, type DispatchEngineOptions, type DispatchOutcome } from "./dispatch/engine.js";
export { createDefaultErrorSink, DEFAULT_MESSAGES } from "./dispatch/errorSink.js";
export { bindArguments, extractId, resolveOptionValue } from "./dispatch/resolve.js";
export { RestInteractionResponder, type InteractionResponder, type ReplyOptions } from "./dispatch/responder.js";
export type * from "./dispatch/payload.js";

export { CommandClient, type ClientConfig, type CommandClientOptions } from "./client.js";

export * from "./lib/errors.js";
export { CommandValidationError, LIMITS, type Localizations } from "./lib/validation.js";
export { loadEnv, parseEnv, type AppConfig } from "./lib/env.js";
export { logger } from "./lib/logger.js";
export { initializeSentry, flushSentry } from "./lib/sentry.js";
