/**
 * slash-registry — tests/sync/transport.test.ts
 * WHAT: REST routes, response validation and access-error mapping.
 * The REST client is real; its verbs are spied so nothing leaves the process.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi, beforeEach } from "vitest";
import { DiscordAPIError, REST } from "discord.js";
import { ZodError } from "zod";

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock("../../src/lib/logger.js", () => ({ logger: mockLogger }));

import { CommandAccessError } from "../../src/lib/errors.js";
import { RestCommandTransport, parseRemoteCommand } from "../../src/sync/transport.js";
import { TEST_APP_ID } from "../utils/fakeTransport.js";
import { TEST_GUILD_ID } from "../utils/payloads.js";

const COMMAND_ID = "1100000000000000001";

const remotePing = {
  id: COMMAND_ID,
  application_id: TEST_APP_ID,
  version: COMMAND_ID,
  type: 1,
  name: "ping",
  description: "Check latency",
  default_member_permissions: null,
  dm_permission: true,
  nsfw: false,
};

function apiError(code: number, status: number, message: string): DiscordAPIError {
  return new DiscordAPIError({ code, message }, code, status, "GET", "https://discord.com/api/v10/test", {});
}

describe("RestCommandTransport", () => {
  let rest: REST;
  let transport: RestCommandTransport;

  beforeEach(() => {
    rest = new REST({ version: "10", handlerSweepInterval: 0, hashSweepInterval: 0 });
    transport = new RestCommandTransport(rest, TEST_APP_ID);
  });

  it("fetches global commands with localizations", async () => {
    const get = vi.spyOn(rest, "get").mockResolvedValue([remotePing]);
    await expect(transport.fetchCommands(null)).resolves.toEqual([remotePing]);

    expect(get).toHaveBeenCalledOnce();
    const [route, options] = get.mock.calls[0];
    expect(route).toBe(`/applications/${TEST_APP_ID}/commands`);
    expect(options?.query?.get("with_localizations")).toBe("true");
  });

  it("uses the guild route for guild scopes", async () => {
    const get = vi.spyOn(rest, "get").mockResolvedValue([]);
    await transport.fetchCommands(TEST_GUILD_ID);
    expect(get.mock.calls[0][0]).toBe(`/applications/${TEST_APP_ID}/guilds/${TEST_GUILD_ID}/commands`);
  });

  it("creates, edits and bulk-overwrites with the wire body", async () => {
    const wire = { type: 1, name: "ping", description: "Check latency" };
    const post = vi.spyOn(rest, "post").mockResolvedValue(remotePing);
    const patch = vi.spyOn(rest, "patch").mockResolvedValue(remotePing);
    const put = vi.spyOn(rest, "put").mockResolvedValue([remotePing]);

    await transport.createCommand(null, wire);
    await transport.editCommand(TEST_GUILD_ID, COMMAND_ID, wire);
    await transport.bulkOverwriteCommands(null, [{ ...wire, id: COMMAND_ID }]);

    expect(post).toHaveBeenCalledWith(`/applications/${TEST_APP_ID}/commands`, { body: wire });
    expect(patch).toHaveBeenCalledWith(`/applications/${TEST_APP_ID}/guilds/${TEST_GUILD_ID}/commands/${COMMAND_ID}`, {
      body: wire,
    });
    expect(put).toHaveBeenCalledWith(`/applications/${TEST_APP_ID}/commands`, {
      body: [{ ...wire, id: COMMAND_ID }],
    });
  });

  it("hands the abort signal to every request", async () => {
    const controller = new AbortController();
    const { signal } = controller;
    const wire = { type: 1, name: "ping", description: "Check latency" };
    const get = vi.spyOn(rest, "get").mockResolvedValue([remotePing]);
    const post = vi.spyOn(rest, "post").mockResolvedValue(remotePing);
    const patch = vi.spyOn(rest, "patch").mockResolvedValue(remotePing);
    const put = vi.spyOn(rest, "put").mockResolvedValue([remotePing]);

    await transport.fetchCommands(TEST_GUILD_ID, { signal });
    await transport.createCommand(TEST_GUILD_ID, wire, { signal });
    await transport.editCommand(TEST_GUILD_ID, COMMAND_ID, wire, { signal });
    await transport.bulkOverwriteCommands(TEST_GUILD_ID, [wire], { signal });

    expect(get.mock.calls[0][1]?.signal).toBe(signal);
    expect(post.mock.calls[0][1]?.signal).toBe(signal);
    expect(patch.mock.calls[0][1]?.signal).toBe(signal);
    expect(put.mock.calls[0][1]?.signal).toBe(signal);
  });

  it("keeps fields it does not model", async () => {
    const entryPoint = {
      ...remotePing,
      type: 4,
      name: "launch",
      description: "Start the activity",
      contexts: [0, 1],
      integration_types: [0],
      handler: 2,
    };
    vi.spyOn(rest, "get").mockResolvedValue([entryPoint]);
    await expect(transport.fetchCommands(null)).resolves.toEqual([entryPoint]);
  });

  it("maps missing access to CommandAccessError", async () => {
    vi.spyOn(rest, "get").mockRejectedValue(apiError(50001, 403, "Missing Access"));
    const result = transport.fetchCommands(TEST_GUILD_ID);
    await expect(result).rejects.toBeInstanceOf(CommandAccessError);
    await expect(result).rejects.toMatchObject({ guildId: TEST_GUILD_ID });
  });

  it("maps any 403 to CommandAccessError", async () => {
    vi.spyOn(rest, "put").mockRejectedValue(apiError(50013, 403, "Missing Permissions"));
    await expect(transport.bulkOverwriteCommands(TEST_GUILD_ID, [])).rejects.toBeInstanceOf(CommandAccessError);
  });

  it("passes other REST errors through", async () => {
    const failure = apiError(50035, 400, "Invalid Form Body");
    vi.spyOn(rest, "post").mockRejectedValue(failure);
    await expect(transport.createCommand(null, { type: 1, name: "x", description: "x" })).rejects.toBe(failure);
  });

  it("rejects responses that are not command objects", async () => {
    vi.spyOn(rest, "get").mockResolvedValue([{ name: "ping" }]);
    await expect(transport.fetchCommands(null)).rejects.toBeInstanceOf(ZodError);
  });

  describe("fetchPermissions", () => {
    it("indexes overrides by command id", async () => {
      const override = { id: "7000000000000000001", type: 1, permission: false };
      const get = vi
        .spyOn(rest, "get")
        .mockResolvedValue([{ id: COMMAND_ID, application_id: TEST_APP_ID, guild_id: TEST_GUILD_ID, permissions: [override] }]);

      const permissions = await transport.fetchPermissions(TEST_GUILD_ID);
      expect(permissions.get(COMMAND_ID)).toEqual([override]);
      expect(get.mock.calls[0][0]).toBe(`/applications/${TEST_APP_ID}/guilds/${TEST_GUILD_ID}/commands/permissions`);
    });

    it("returns nothing when the guild denies access", async () => {
      vi.spyOn(rest, "get").mockRejectedValue(apiError(50001, 403, "Missing Access"));
      await expect(transport.fetchPermissions(TEST_GUILD_ID)).resolves.toEqual(new Map());
    });
  });
});

describe("parseRemoteCommand", () => {
  it("accepts nested options and null localizations", () => {
    const raw = {
      ...remotePing,
      name_localizations: null,
      options: [{ type: 1, name: "status", description: "Status", options: [{ type: 3, name: "q", description: "Q" }] }],
    };
    expect(parseRemoteCommand(raw).options?.[0].options?.[0].name).toBe("q");
  });
});
