/**
 * slash-registry — src/dispatch/resolve.ts
 * WHAT: Turns supplied option values into typed arguments using the payload's resolved bundle.
 * FLOWS: bindArguments(node, layer, resolved) → resolveOptionValue per option → defaults injected → { args, focused }
 * Lookups fall back to the raw id when the bundle lacks the entity.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { ApplicationCommandOptionType } from "discord.js";
import { hasDefault } from "../commands/option.js";
import type { SlashCommand, SubCommand } from "../commands/nodes.js";
import type { CommandArgs, FocusedOption } from "../commands/types.js";
import type { InvocationOption, ResolvedBundle, ResolvedMember, ResolvedUser, ResolvedValue } from "./payload.js";

/** Nodes that own an option list. */
export type LeafTarget = SlashCommand | SubCommand;

export interface BoundArguments {
  args: CommandArgs;
  focused: FocusedOption | null;
}

/** "<@!123>", "<@&123>", "<#123>" and bare "123" all yield "123". */
export function extractId(raw: string | number | boolean): string {
  return String(raw).replace(/[<!@&#>]/g, "");
}

/** Member (with its user attached), then user, else null. */
function lookupUser(id: string, resolved: ResolvedBundle | undefined): ResolvedMember | ResolvedUser | null {
  const member = resolved?.members?.[id];
  if (member) {
    const user = member.user ?? resolved?.users?.[id];
    return user ? { ...member, user } : member;
  }
  return resolved?.users?.[id] ?? null;
}

export function resolveUser(raw: string | number | boolean, resolved: ResolvedBundle | undefined): ResolvedValue {
  const id = extractId(raw);
  return lookupUser(id, resolved) ?? id;
}

export function resolveOptionValue(
  type: number,
  raw: string | number | boolean,
  resolved: ResolvedBundle | undefined
): ResolvedValue {
  switch (type) {
    case ApplicationCommandOptionType.User:
      return resolveUser(raw, resolved);
    case ApplicationCommandOptionType.Role: {
      const id = extractId(raw);
      return resolved?.roles?.[id] ?? id;
    }
    case ApplicationCommandOptionType.Channel: {
      const id = extractId(raw);
      return resolved?.channels?.[id] ?? id;
    }
    case ApplicationCommandOptionType.Attachment: {
      const id = extractId(raw);
      return resolved?.attachments?.[id] ?? id;
    }
    case ApplicationCommandOptionType.Mentionable: {
      const id = extractId(raw);
      // "<@&id>" is a role mention
      if (String(raw).includes("&")) {
        return resolved?.roles?.[id] ?? id;
      }
      return lookupUser(id, resolved) ?? resolved?.roles?.[id] ?? id;
    }
    default:
      return raw;
  }
}

/**
 * Binds one option layer to the node's parameters. The focused option of an autocomplete
 * payload keeps its partial raw value.
 */
export function bindArguments(
  node: LeafTarget,
  supplied: readonly InvocationOption[],
  resolved: ResolvedBundle | undefined
): BoundArguments {
  // No prototype: "__proto__" is a valid option name and must bind like any other
  const args: CommandArgs = Object.create(null);
  let focused: FocusedOption | null = null;
  const declared = new Map(node.options.map((o) => [o.name, o]));

  for (const option of supplied) {
    if (option.value === undefined) continue;
    const param = node.paramFor(option.name);
    if (option.focused) {
      focused = { name: option.name, value: option.value };
      args[param] = option.value;
      continue;
    }
    const type = declared.get(option.name)?.type ?? option.type;
    args[param] = resolveOptionValue(type, option.value, resolved);
  }

  for (const option of node.options) {
    const param = node.paramFor(option.name);
    if (!Object.hasOwn(args, param) && hasDefault(option.defaultValue)) {
      args[param] = option.defaultValue;
    }
  }

  return { args, focused };
}

/** The single `target` argument of a context-menu invocation. */
export function resolveTarget(
  kind: "user" | "message",
  targetId: string | undefined,
  resolved: ResolvedBundle | undefined
): ResolvedValue | null {
  if (!targetId) return null;
  if (kind === "user") return resolveUser(targetId, resolved);
  return resolved?.messages?.[targetId] ?? targetId;
}
