/**
 * slash-registry — src/commands/format.ts
 * WHAT: Human-readable tree lines for a command list (local wire forms or a remote fetch).
 * USAGE: formatCommandTree(commands).forEach((line) => console.log(line))
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { ApplicationCommandOptionType, ApplicationCommandType } from "discord.js";
import type { CommandWire, OptionWire } from "./types.js";

// Alias because the full enum name makes every filter line wrap
const OPTION = ApplicationCommandOptionType;

/** Optional options get a trailing "?". */
function formatOptionList(options: readonly OptionWire[] | undefined): string {
  if (!options || options.length === 0) return "";
  return `(${options.map((opt) => `${opt.name}${opt.required ? "" : "?"}`).join(", ")})`;
}

function formatSubcommand(sub: OptionWire): string {
  return `${sub.name}${formatOptionList(sub.options)}`;
}

export function formatCommandTree(commands: readonly CommandWire[]): string[] {
  const lines: string[] = [];
  for (const command of commands) {
    if (command.type === ApplicationCommandType.User || command.type === ApplicationCommandType.Message) {
      lines.push(`[${command.type === ApplicationCommandType.User ? "user" : "message"}] ${command.name}`);
      continue;
    }

    const options = command.options ?? [];
    const scalars = options.filter((opt) => opt.type !== OPTION.Subcommand && opt.type !== OPTION.SubcommandGroup);
    lines.push(`/${command.name}${formatOptionList(scalars)}`);

    for (const group of options.filter((opt) => opt.type === OPTION.SubcommandGroup)) {
      const subs = (group.options ?? []).filter((opt) => opt.type === OPTION.Subcommand).map(formatSubcommand);
      lines.push(`  group ${group.name}: ${subs.join(", ") || "(empty)"}`);
    }
    const directSubs = options.filter((opt) => opt.type === OPTION.Subcommand).map(formatSubcommand);
    if (directSubs.length > 0) {
      lines.push(`  subcommands: ${directSubs.join(", ")}`);
    }
  }
  return lines;
}
