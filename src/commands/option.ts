/**
 * slash-registry — src/commands/option.ts
 * WHAT: Typed, self-validating description of one command argument.
 * FLOWS: new CommandOption(init) → validate (throws CommandValidationError) → toWire()
 * DOCS:
 *  - Option structure: https://discord.com/developers/docs/interactions/application-commands#application-command-object-application-command-option-structure
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { ApplicationCommandOptionType, ChannelType } from "discord.js";
import {
  CommandValidationError,
  LIMITS,
  type Localizations,
  assertUniqueNames,
  validateChatName,
  validateDescription,
  validateLocalizations,
} from "../lib/validation.js";
import type { ChoiceWire, OptionWire, WireLocalizations } from "./types.js";

/** Every option type that carries a value (everything but sub-commands and groups). */
export type ScalarOptionType =
  | ApplicationCommandOptionType.String
  | ApplicationCommandOptionType.Integer
  | ApplicationCommandOptionType.Boolean
  | ApplicationCommandOptionType.User
  | ApplicationCommandOptionType.Channel
  | ApplicationCommandOptionType.Role
  | ApplicationCommandOptionType.Mentionable
  | ApplicationCommandOptionType.Number
  | ApplicationCommandOptionType.Attachment;

const SCALAR_TYPES: ReadonlySet<number> = new Set<number>([
  ApplicationCommandOptionType.String,
  ApplicationCommandOptionType.Integer,
  ApplicationCommandOptionType.Boolean,
  ApplicationCommandOptionType.User,
  ApplicationCommandOptionType.Channel,
  ApplicationCommandOptionType.Role,
  ApplicationCommandOptionType.Mentionable,
  ApplicationCommandOptionType.Number,
  ApplicationCommandOptionType.Attachment,
]);

const CHOICE_TYPES: ReadonlySet<number> = new Set<number>([
  ApplicationCommandOptionType.String,
  ApplicationCommandOptionType.Integer,
  ApplicationCommandOptionType.Number,
]);

export type OptionDefault = string | number | boolean | null;

export interface ChoiceInit {
  name: string;
  value: string | number;
  nameLocalizations?: Localizations;
}

export interface OptionInit {
  type: ScalarOptionType;
  name: string;
  description: string;
  required?: boolean;
  choices?: readonly ChoiceInit[];
  autocomplete?: boolean;
  min?: number;
  max?: number;
  channelTypes?: readonly ChannelType[];
  /** Injected into the bound arguments when the option is not supplied. */
  default?: OptionDefault;
  nameLocalizations?: Localizations;
  descriptionLocalizations?: Localizations;
}

/** Localization maps are emitted only when they carry at least one entry. */
export function localizationsToWire(map: Localizations | undefined): WireLocalizations | undefined {
  if (!map) return undefined;
  const out: WireLocalizations = {};
  for (const [locale, text] of Object.entries(map)) {
    if (text !== undefined) out[locale] = text;
  }
  return Object.keys(out).length > 0 ? out : undefined;
}

export function hasDefault(value: OptionDefault | undefined): value is string | number | boolean {
  return value !== undefined && value !== null && value !== "";
}

export class CommandOption {
  readonly type: ScalarOptionType;
  readonly name: string;
  readonly description: string;
  readonly required: boolean;
  readonly choices: readonly ChoiceInit[];
  readonly autocomplete: boolean;
  readonly min: number | undefined;
  readonly max: number | undefined;
  readonly channelTypes: readonly ChannelType[];
  readonly defaultValue: OptionDefault | undefined;
  readonly nameLocalizations: Localizations | undefined;
  readonly descriptionLocalizations: Localizations | undefined;

  constructor(init: OptionInit) {
    const field = `option "${init.name}"`;

    if (!SCALAR_TYPES.has(init.type)) {
      throw new CommandValidationError(`${field} has unsupported type ${String(init.type)}`, "type", init.type);
    }
    validateChatName(init.name, `${field} name`);
    validateDescription(init.description, `${field} description`);
    validateLocalizations(init.nameLocalizations, "chat_name", `${field} name_localizations`);
    validateLocalizations(init.descriptionLocalizations, "description", `${field} description_localizations`);

    const choices = init.choices ?? [];
    if (choices.length > 0) {
      if (!CHOICE_TYPES.has(init.type)) {
        throw new CommandValidationError(`${field}: choices only apply to string, integer and number options`, "choices");
      }
      if (choices.length > LIMITS.CHOICES_MAX) {
        throw new CommandValidationError(
          `${field} has ${choices.length} choices; at most ${LIMITS.CHOICES_MAX} are allowed`,
          "choices",
          choices.length
        );
      }
      if (init.autocomplete) {
        throw new CommandValidationError(`${field}: choices and autocomplete are mutually exclusive`, "autocomplete");
      }
      for (const choice of choices) validateChoice(init.type, choice, field);
      assertUniqueNames(
        choices.map((c) => c.name),
        `${field} choices`
      );
    }

    if (init.autocomplete && !CHOICE_TYPES.has(init.type)) {
      throw new CommandValidationError(
        `${field}: autocomplete only applies to string, integer and number options`,
        "autocomplete"
      );
    }

    if (init.min !== undefined || init.max !== undefined) {
      if (init.type !== ApplicationCommandOptionType.Integer && init.type !== ApplicationCommandOptionType.Number) {
        throw new CommandValidationError(`${field}: min/max only apply to integer and number options`, "min_value");
      }
      for (const [key, bound] of [
        ["min_value", init.min],
        ["max_value", init.max],
      ] as const) {
        if (bound === undefined) continue;
        if (!Number.isFinite(bound)) {
          throw new CommandValidationError(`${field}: ${key} must be a finite number`, key, bound);
        }
        if (init.type === ApplicationCommandOptionType.Integer && !Number.isInteger(bound)) {
          throw new CommandValidationError(`${field}: ${key} must be an integer`, key, bound);
        }
      }
      if (init.min !== undefined && init.max !== undefined && init.min > init.max) {
        throw new CommandValidationError(`${field}: min_value ${init.min} exceeds max_value ${init.max}`, "min_value");
      }
    }

    const channelTypes = [...new Set(init.channelTypes ?? [])].sort((a, b) => a - b);
    if (channelTypes.length > 0 && init.type !== ApplicationCommandOptionType.Channel) {
      throw new CommandValidationError(`${field}: channel types only apply to channel options`, "channel_types");
    }

    this.type = init.type;
    this.name = init.name;
    this.description = init.description;
    this.required = init.required ?? false;
    this.choices = choices;
    this.autocomplete = init.autocomplete ?? false;
    this.min = init.min;
    this.max = init.max;
    this.channelTypes = channelTypes;
    this.defaultValue = init.default;
    this.nameLocalizations = init.nameLocalizations;
    this.descriptionLocalizations = init.descriptionLocalizations;
  }

  toWire(): OptionWire {
    const wire: OptionWire = {
      type: this.type,
      name: this.name,
      description: this.description,
      required: this.required,
    };
    const nameLocalizations = localizationsToWire(this.nameLocalizations);
    if (nameLocalizations) wire.name_localizations = nameLocalizations;
    const descriptionLocalizations = localizationsToWire(this.descriptionLocalizations);
    if (descriptionLocalizations) wire.description_localizations = descriptionLocalizations;

    if (this.choices.length > 0) {
      wire.choices = this.choices.map((choice) => {
        const out: ChoiceWire = { name: choice.name, value: choice.value };
        const locs = localizationsToWire(choice.nameLocalizations);
        if (locs) out.name_localizations = locs;
        return out;
      });
    } else if (this.autocomplete) {
      wire.autocomplete = true;
    }
    if (this.min !== undefined) wire.min_value = this.min;
    if (this.max !== undefined) wire.max_value = this.max;
    if (this.channelTypes.length > 0) wire.channel_types = [...this.channelTypes];
    return wire;
  }
}

function validateChoice(type: ScalarOptionType, choice: ChoiceInit, field: string): void {
  const choiceField = `${field} choice "${choice.name}"`;
  const nameLength = typeof choice.name === "string" ? [...choice.name].length : 0;
  if (nameLength < 1 || nameLength > LIMITS.CHOICE_NAME_MAX) {
    throw new CommandValidationError(
      `${choiceField} name must be 1-${LIMITS.CHOICE_NAME_MAX} characters`,
      "choices.name",
      choice.name
    );
  }
  validateLocalizations(choice.nameLocalizations, "description", `${choiceField} name_localizations`);

  const { value } = choice;
  switch (type) {
    case ApplicationCommandOptionType.String:
      if (typeof value !== "string" || [...value].length > LIMITS.CHOICE_STRING_VALUE_MAX) {
        throw new CommandValidationError(
          `${choiceField} value must be a string of at most ${LIMITS.CHOICE_STRING_VALUE_MAX} characters`,
          "choices.value",
          value
        );
      }
      return;
    case ApplicationCommandOptionType.Integer:
      if (typeof value !== "number" || !Number.isInteger(value)) {
        throw new CommandValidationError(`${choiceField} value must be an integer`, "choices.value", value);
      }
      return;
    default:
      if (typeof value !== "number" || !Number.isFinite(value)) {
        throw new CommandValidationError(`${choiceField} value must be a number`, "choices.value", value);
      }
  }
}
