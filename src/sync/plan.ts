/**
 * slash-registry — src/sync/plan.ts
 * WHAT: Pure staging + write decision for one scope.
 * FLOWS: stageChanges(local, remote) → SyncPlan → chooseWriteOperation(plan, policy) → WriteOperation
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { RootCommand } from "../commands/nodes.js";
import { type CommandWire, type IdentifiedCommandWire, type RemoteCommand, kindOfType } from "../commands/types.js";

export interface StagedPair {
  node: RootCommand;
  remote: RemoteCommand;
}

export interface SyncPlan {
  /** Same name and kind, different content. Written with the remote id. */
  updates: StagedPair[];
  /** Local nodes with no remote entry. */
  creates: RootCommand[];
  /** Already matching. */
  carryOver: StagedPair[];
  /** Remote entries with no local node. */
  removals: RemoteCommand[];
  /** Remote entries of command types not managed here. Always kept. */
  foreign: RemoteCommand[];
}

export type WriteOperation =
  | { type: "none" }
  | { type: "create"; node: RootCommand; command: CommandWire }
  | { type: "edit"; node: RootCommand; commandId: string; command: CommandWire }
  | { type: "bulk"; commands: IdentifiedCommandWire[] };

export interface WritePolicy {
  /** When false, removal candidates are written back instead of deleted. */
  deleteUnknown: boolean;
}

export function stageChanges(local: readonly RootCommand[], remote: readonly RemoteCommand[]): SyncPlan {
  const plan: SyncPlan = { updates: [], creates: [], carryOver: [], removals: [], foreign: [] };
  const matched = new Set<RootCommand>();

  for (const entry of remote) {
    const kind = kindOfType(entry.type);
    if (!kind) {
      plan.foreign.push(entry);
      continue;
    }
    const node = local.find((n) => n.commandKind === kind && n.name === entry.name);
    if (!node) {
      plan.removals.push(entry);
      continue;
    }
    matched.add(node);
    if (node.equals(entry)) plan.carryOver.push({ node, remote: entry });
    else plan.updates.push({ node, remote: entry });
  }

  for (const node of local) {
    if (!matched.has(node)) plan.creates.push(node);
  }
  return plan;
}

// Response-only fields and the ones remoteToWire copies itself
const NOT_COPIED = new Set([
  "id",
  "application_id",
  "guild_id",
  "version",
  "name_localized",
  "description_localized",
  "type",
  "name",
  "description",
  "name_localizations",
  "description_localizations",
  "default_member_permissions",
  "dm_permission",
  "nsfw",
  "options",
]);

/** The remote entry as it would be sent back unchanged. */
export function remoteToWire(remote: RemoteCommand): IdentifiedCommandWire {
  const wire: IdentifiedCommandWire = {
    id: remote.id,
    type: remote.type,
    name: remote.name,
    description: remote.description,
  };
  if (remote.name_localizations) wire.name_localizations = remote.name_localizations;
  if (remote.description_localizations) wire.description_localizations = remote.description_localizations;
  if (remote.default_member_permissions !== undefined) {
    wire.default_member_permissions = remote.default_member_permissions;
  }
  if (remote.dm_permission !== undefined && remote.guild_id === undefined) wire.dm_permission = remote.dm_permission;
  if (remote.nsfw !== undefined) wire.nsfw = remote.nsfw;
  if (remote.options) wire.options = remote.options;
  for (const [field, value] of Object.entries(remote)) {
    if (!NOT_COPIED.has(field) && value !== undefined) wire[field] = value;
  }
  return wire;
}

/**
 * One change and nothing to remove → a single targeted create or edit.
 * Anything else that needs writing → one bulk overwrite of the full desired set.
 */
export function chooseWriteOperation(plan: SyncPlan, policy: WritePolicy): WriteOperation {
  const changes = plan.updates.length + plan.creates.length;
  const removals = plan.removals.length;

  if (changes === 0 && (removals === 0 || !policy.deleteUnknown)) {
    return { type: "none" };
  }

  if (changes === 1 && removals === 0) {
    const [update] = plan.updates;
    if (update) {
      return { type: "edit", node: update.node, commandId: update.remote.id, command: update.node.toWire() };
    }
    const [node] = plan.creates;
    return { type: "create", node, command: node.toWire() };
  }

  const commands: IdentifiedCommandWire[] = [
    ...plan.updates.map(({ node, remote }) => ({ ...node.toWire(), id: remote.id })),
    ...plan.creates.map((node) => node.toWire()),
    ...(policy.deleteUnknown ? [] : plan.removals.map(remoteToWire)),
    ...plan.carryOver.map(({ node, remote }) => ({ ...node.toWire(), id: remote.id })),
    ...plan.foreign.map(remoteToWire),
  ];
  return { type: "bulk", commands };
}
