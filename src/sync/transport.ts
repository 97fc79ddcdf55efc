/**
 * slash-registry — src/sync/transport.ts
 * WHAT: The four remote command operations (+ guild permission snapshot) the sync engine needs.
 * FLOWS: RestCommandTransport → REST get/post/patch/put on Routes.applicationCommands / applicationGuildCommands
 *        → zod-validated RemoteCommand[]; 50001 / 403 → CommandAccessError
 * DOCS:
 *  - Application command endpoints: https://discord.com/developers/docs/interactions/application-commands#endpoints
 *  - REST client / Routes: https://discord.js.org/#/docs/rest/main/class/REST
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0
import { DiscordAPIError, type REST, RESTJSONErrorCodes, Routes } from "discord.js";
import { z } from "zod";
import type {
  ChoiceWire,
  CommandPermission,
  CommandWire,
  IdentifiedCommandWire,
  OptionWire,
  RemoteCommand,
} from "../commands/types.js";
import { CommandAccessError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

export interface TransportRequestOptions {
  /** Aborts the request in flight. */
  signal?: AbortSignal;
}

export interface CommandTransport {
  fetchCommands(guildId: string | null, options?: TransportRequestOptions): Promise<RemoteCommand[]>;
  createCommand(guildId: string | null, command: CommandWire, options?: TransportRequestOptions): Promise<RemoteCommand>;
  editCommand(
    guildId: string | null,
    commandId: string,
    command: CommandWire,
    options?: TransportRequestOptions
  ): Promise<RemoteCommand>;
  bulkOverwriteCommands(
    guildId: string | null,
    commands: readonly IdentifiedCommandWire[],
    options?: TransportRequestOptions
  ): Promise<RemoteCommand[]>;
  /** Command id → permission overrides in one guild. */
  fetchPermissions(guildId: string, options?: TransportRequestOptions): Promise<Map<string, CommandPermission[]>>;
}

// ===== Response schemas =====

const localizationsSchema = z.record(z.string().nullable()).nullable().optional();

// Unlisted fields (contexts, integration_types, handler, min_length, ...) pass through so that
// commands written back in a bulk overwrite keep them
const choiceSchema: z.ZodType<ChoiceWire> = z
  .object({
    name: z.string(),
    name_localizations: localizationsSchema,
    value: z.union([z.string(), z.number()]),
  })
  .passthrough();

const optionSchema: z.ZodType<OptionWire> = z.lazy(() =>
  z.object({
    type: z.number().int(),
    name: z.string(),
    name_localizations: localizationsSchema,
    description: z.string(),
    description_localizations: localizationsSchema,
    required: z.boolean().optional(),
    choices: z.array(choiceSchema).optional(),
    autocomplete: z.boolean().optional(),
    min_value: z.number().optional(),
    max_value: z.number().optional(),
    channel_types: z.array(z.number().int()).optional(),
    options: z.array(optionSchema).optional(),
  }).passthrough()
);

const remoteCommandSchema = z.object({
  id: z.string(),
  application_id: z.string(),
  guild_id: z.string().optional(),
  version: z.string(),
  type: z.number().int(),
  name: z.string(),
  name_localizations: localizationsSchema,
  description: z.string(),
  description_localizations: localizationsSchema,
  default_member_permissions: z.string().nullable().optional(),
  dm_permission: z.boolean().optional(),
  nsfw: z.boolean().optional(),
  options: z.array(optionSchema).optional(),
}).passthrough();

const permissionsSchema = z.array(
  z.object({
    id: z.string(),
    permissions: z.array(z.object({ id: z.string(), type: z.number().int(), permission: z.boolean() })),
  })
);

export function parseRemoteCommand(raw: unknown): RemoteCommand {
  return remoteCommandSchema.parse(raw);
}

export function parseRemoteCommands(raw: unknown): RemoteCommand[] {
  return z.array(remoteCommandSchema).parse(raw);
}

// ===== REST implementation =====

function isAccessDenied(err: unknown): err is DiscordAPIError {
  return err instanceof DiscordAPIError && (err.code === RESTJSONErrorCodes.MissingAccess || err.status === 403);
}

export class RestCommandTransport implements CommandTransport {
  constructor(
    private readonly rest: REST,
    private readonly applicationId: string
  ) {}

  private commandsRoute(guildId: string | null): `/${string}` {
    return guildId
      ? Routes.applicationGuildCommands(this.applicationId, guildId)
      : Routes.applicationCommands(this.applicationId);
  }

  private commandRoute(guildId: string | null, commandId: string): `/${string}` {
    return guildId
      ? Routes.applicationGuildCommand(this.applicationId, guildId, commandId)
      : Routes.applicationCommand(this.applicationId, commandId);
  }

  /** Runs one request; missing access becomes CommandAccessError, anything else propagates. */
  private async request(guildId: string | null, send: () => Promise<unknown>): Promise<unknown> {
    try {
      return await send();
    } catch (err) {
      if (isAccessDenied(err)) {
        throw new CommandAccessError(guildId, { cause: err });
      }
      throw err;
    }
  }

  async fetchCommands(guildId: string | null, { signal }: TransportRequestOptions = {}): Promise<RemoteCommand[]> {
    const raw = await this.request(guildId, () =>
      this.rest.get(this.commandsRoute(guildId), {
        query: new URLSearchParams({ with_localizations: "true" }),
        signal,
      })
    );
    return parseRemoteCommands(raw);
  }

  async createCommand(
    guildId: string | null,
    command: CommandWire,
    { signal }: TransportRequestOptions = {}
  ): Promise<RemoteCommand> {
    const raw = await this.request(guildId, () =>
      this.rest.post(this.commandsRoute(guildId), { body: command, signal })
    );
    return parseRemoteCommand(raw);
  }

  async editCommand(
    guildId: string | null,
    commandId: string,
    command: CommandWire,
    { signal }: TransportRequestOptions = {}
  ): Promise<RemoteCommand> {
    const raw = await this.request(guildId, () =>
      this.rest.patch(this.commandRoute(guildId, commandId), { body: command, signal })
    );
    return parseRemoteCommand(raw);
  }

  async bulkOverwriteCommands(
    guildId: string | null,
    commands: readonly IdentifiedCommandWire[],
    { signal }: TransportRequestOptions = {}
  ): Promise<RemoteCommand[]> {
    const raw = await this.request(guildId, () =>
      this.rest.put(this.commandsRoute(guildId), { body: commands, signal })
    );
    return parseRemoteCommands(raw);
  }

  async fetchPermissions(
    guildId: string,
    { signal }: TransportRequestOptions = {}
  ): Promise<Map<string, CommandPermission[]>> {
    try {
      const raw = await this.request(guildId, () =>
        this.rest.get(Routes.guildApplicationCommandsPermissions(this.applicationId, guildId), { signal })
      );
      return new Map(permissionsSchema.parse(raw).map((entry) => [entry.id, entry.permissions]));
    } catch (err) {
      if (err instanceof CommandAccessError) {
        logger.debug({ evt: "permissions_unavailable", guildId }, "[sync] no access to command permissions");
        return new Map();
      }
      throw err;
    }
  }
}
