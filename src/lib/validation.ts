/**
 * slash-registry — src/lib/validation.ts
 * WHAT: Construction-time validation for command names, descriptions, localizations and ids.
 * FLOWS:
 *  - validateChatName(name) → throws if not 1-32 lowercase word characters
 *  - validateContextMenuName(name) → throws if not 1-32 characters
 *  - validateDescription(text) → throws if not 1-100 characters
 *  - validateSnowflake(id) → throws if not a snowflake
 * DOCS:
 *  - Naming rules: https://discord.com/developers/docs/interactions/application-commands#application-command-object-application-command-naming
 *  - Snowflakes: https://discord.com/developers/docs/reference#snowflakes
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import type { Locale } from "discord.js";

/** Platform limits enforced before anything is sent. */
export const LIMITS = {
  NAME_MAX: 32,
  DESCRIPTION_MAX: 100,
  CHOICE_NAME_MAX: 100,
  CHOICE_STRING_VALUE_MAX: 100,
  CHOICES_MAX: 25,
  OPTIONS_MAX: 25,
  CHILDREN_MAX: 25,
  CHAT_COMMANDS_PER_SCOPE: 100,
  CONTEXT_MENU_COMMANDS_PER_SCOPE: 5,
} as const;

/**
 * Chat-input and option names: letters, digits, `-` and `_`, plus the Devanagari
 * and Thai scripts the platform also accepts. Length counts code points.
 */
const CHAT_NAME_PATTERN = /^[-_\p{L}\p{N}\p{sc=Deva}\p{sc=Thai}]{1,32}$/u;

/** Snowflakes are 17-20 digit numeric strings. */
const SNOWFLAKE_PATTERN = /^\d{17,20}$/;

export type Localizations = Partial<Record<Locale, string>>;

export class CommandValidationError extends Error {
  constructor(
    message: string,
    public readonly field?: string,
    public readonly value?: unknown
  ) {
    super(message);
    this.name = "CommandValidationError";
  }
}

function codePoints(value: string): number {
  return [...value].length;
}

export function validateChatName(name: string, field = "name"): void {
  if (typeof name !== "string" || !CHAT_NAME_PATTERN.test(name)) {
    throw new CommandValidationError(
      `${field} must be 1-${LIMITS.NAME_MAX} characters of letters, digits, "-" or "_", got "${name}"`,
      field,
      name
    );
  }
  if (name !== name.toLowerCase()) {
    throw new CommandValidationError(`${field} must be lowercase, got "${name}"`, field, name);
  }
}

export function validateContextMenuName(name: string, field = "name"): void {
  const length = typeof name === "string" ? codePoints(name) : 0;
  if (length < 1 || length > LIMITS.NAME_MAX || name.trim() !== name) {
    throw new CommandValidationError(
      `${field} must be 1-${LIMITS.NAME_MAX} characters without surrounding whitespace, got "${name}"`,
      field,
      name
    );
  }
}

export function validateDescription(description: string, field = "description"): void {
  const length = typeof description === "string" ? codePoints(description) : 0;
  if (length < 1 || length > LIMITS.DESCRIPTION_MAX) {
    throw new CommandValidationError(
      `${field} must be 1-${LIMITS.DESCRIPTION_MAX} characters long, got ${length}`,
      field,
      description
    );
  }
}

/**
 * Localized names follow the same rule as the base name they translate.
 */
export function validateLocalizations(
  map: Localizations | undefined,
  kind: "chat_name" | "context_name" | "description",
  field: string
): void {
  if (!map) return;
  for (const [locale, text] of Object.entries(map)) {
    if (text === undefined) continue;
    const localeField = `${field}.${locale}`;
    if (kind === "chat_name") validateChatName(text, localeField);
    else if (kind === "context_name") validateContextMenuName(text, localeField);
    else validateDescription(text, localeField);
  }
}

export function validateSnowflake(id: string, fieldName = "id"): void {
  if (!id || typeof id !== "string") {
    throw new CommandValidationError(`${fieldName} cannot be empty`, fieldName, id);
  }
  if (!SNOWFLAKE_PATTERN.test(id.trim())) {
    throw new CommandValidationError(
      `${fieldName} must be a snowflake (17-20 digits), got "${id}"`,
      fieldName,
      id
    );
  }
}

/**
 * Names must be unique among siblings (options of one leaf, children of one container).
 */
export function assertUniqueNames(names: readonly string[], field: string): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new CommandValidationError(`${field} contains "${name}" more than once`, field, name);
    }
    seen.add(name);
  }
}
