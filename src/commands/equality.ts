/**
 * slash-registry — src/commands/equality.ts
 * WHAT: Structural comparison between a locally produced wire form and a remote entry.
 * WHY: The sync engine only writes what differs; a false "unequal" costs a write per sync.
 * FLOWS: commandsEqual(local, remote) → optionListsEqual(...) → optionsEqual(...) per name-matched pair
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { ApplicationCommandOptionType } from "discord.js";
import type { ChoiceWire, CommandWire, OptionWire, WireLocalizations } from "./types.js";

function isContainerType(type: number): boolean {
  return type === ApplicationCommandOptionType.Subcommand || type === ApplicationCommandOptionType.SubcommandGroup;
}

function localizationsEqual(a: WireLocalizations | null | undefined, b: WireLocalizations | null | undefined): boolean {
  const left = Object.entries(a ?? {}).filter(([, text]) => text !== null);
  const right = new Map(Object.entries(b ?? {}).filter(([, text]) => text !== null));
  if (left.length !== right.size) return false;
  return left.every(([locale, text]) => right.get(locale) === text);
}

function choicesEqual(a: ChoiceWire[] | undefined, b: ChoiceWire[] | undefined): boolean {
  const left = a ?? [];
  const right = b ?? [];
  if (left.length !== right.length) return false;
  return left.every((choice, i) => {
    const other = right[i];
    return (
      choice.name === other.name &&
      choice.value === other.value &&
      localizationsEqual(choice.name_localizations, other.name_localizations)
    );
  });
}

function sortedNumbers(values: number[] | undefined): string {
  return [...(values ?? [])].sort((x, y) => x - y).join(",");
}

function optionsEqual(local: OptionWire, remote: OptionWire): boolean {
  if (
    local.type !== remote.type ||
    local.name !== remote.name ||
    local.description !== remote.description ||
    // The remote drops required=false
    (local.required ?? false) !== (remote.required ?? false) ||
    (local.autocomplete ?? false) !== (remote.autocomplete ?? false) ||
    local.min_value !== remote.min_value ||
    local.max_value !== remote.max_value
  ) {
    return false;
  }
  if (sortedNumbers(local.channel_types) !== sortedNumbers(remote.channel_types)) return false;
  if (!choicesEqual(local.choices, remote.choices)) return false;
  if (!localizationsEqual(local.name_localizations, remote.name_localizations)) return false;
  if (!localizationsEqual(local.description_localizations, remote.description_localizations)) return false;

  if (isContainerType(local.type)) {
    return optionListsEqual(local.options, remote.options);
  }
  return true;
}

/**
 * Every entry must find a same-named partner on the other side. Scalar options must
 * also sit at the same index; sub-commands and groups may be reordered.
 */
export function optionListsEqual(local: OptionWire[] | undefined, remote: OptionWire[] | undefined): boolean {
  const left = local ?? [];
  const right = remote ?? [];
  if (left.length !== right.length) return false;

  for (const [index, remoteOption] of right.entries()) {
    const localIndex = left.findIndex((o) => o.name === remoteOption.name);
    if (localIndex === -1) return false;
    const localOption = left[localIndex];
    if (localIndex !== index && !isContainerType(localOption.type)) return false;
    if (!optionsEqual(localOption, remoteOption)) return false;
  }

  for (const [index, localOption] of left.entries()) {
    const remoteIndex = right.findIndex((o) => o.name === localOption.name);
    if (remoteIndex === -1) return false;
    if (remoteIndex !== index && !isContainerType(localOption.type)) return false;
  }
  return true;
}

/**
 * True when writing `local` would not change `remote`. Absent booleans compare as the
 * platform's defaults; dm_permission is only compared for global commands.
 */
export function commandsEqual(local: CommandWire, remote: CommandWire): boolean {
  if (local.type !== remote.type || local.name !== remote.name || local.description !== remote.description) {
    return false;
  }
  if (!localizationsEqual(local.name_localizations, remote.name_localizations)) return false;
  if (!localizationsEqual(local.description_localizations, remote.description_localizations)) return false;
  if ((local.default_member_permissions ?? null) !== (remote.default_member_permissions ?? null)) return false;
  if ((local.nsfw ?? false) !== (remote.nsfw ?? false)) return false;
  if (local.dm_permission !== undefined && local.dm_permission !== (remote.dm_permission ?? true)) return false;
  return optionListsEqual(local.options, remote.options);
}
