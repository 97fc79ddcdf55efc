/**
 * slash-registry — tests/commands/nodes.test.ts
 * WHAT: Tree construction rules, wire output, check order and error handler fallback.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";
import { ApplicationCommandOptionType } from "discord.js";

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock("../../src/lib/logger.js", () => ({ logger: mockLogger }));

import { ContextMenuCommand, SlashCommand } from "../../src/commands/nodes.js";
import type { CommandCheck, CommandErrorHandler, RemoteBinding } from "../../src/commands/types.js";
import { CommandValidationError } from "../../src/lib/validation.js";
import { TEST_GUILD_ID, createRecordingResponder, makeContext } from "../utils/payloads.js";

const noop = () => {};

describe("SlashCommand", () => {
  it("renders a global leaf with its options and flags", () => {
    const cmd = new SlashCommand({
      name: "ping",
      description: "Check latency",
      defaultMemberPermissions: 8n,
      options: [{ type: ApplicationCommandOptionType.Boolean, name: "verbose", description: "More detail" }],
      handler: noop,
    });
    expect(cmd.toWire()).toEqual({
      type: 1,
      name: "ping",
      description: "Check latency",
      default_member_permissions: "8",
      dm_permission: true,
      nsfw: false,
      options: [{ type: 5, name: "verbose", description: "More detail", required: false }],
    });
  });

  it("omits dm_permission for guild commands and normalizes guild ids", () => {
    const cmd = new SlashCommand({
      name: "ping",
      description: "Check latency",
      guildIds: ["3000000000000000002", TEST_GUILD_ID, TEST_GUILD_ID],
      handler: noop,
    });
    expect(cmd.guildIds).toEqual([TEST_GUILD_ID, "3000000000000000002"]);
    expect(cmd.scopes()).toEqual([TEST_GUILD_ID, "3000000000000000002"]);
    expect(cmd.toWire()).toEqual({
      type: 1,
      name: "ping",
      description: "Check latency",
      default_member_permissions: null,
      nsfw: false,
    });
  });

  it("rejects an empty guild list and bad permission strings", () => {
    expect(() => new SlashCommand({ name: "ping", description: "d", guildIds: [] })).toThrow(
      "guildIds cannot be empty; omit it for a global command"
    );
    expect(() => new SlashCommand({ name: "ping", description: "d", defaultMemberPermissions: "admin" })).toThrow(
      CommandValidationError
    );
  });

  it("rejects a required option after an optional one", () => {
    expect(
      () =>
        new SlashCommand({
          name: "ban",
          description: "Ban someone",
          options: [
            { type: ApplicationCommandOptionType.String, name: "reason", description: "Why" },
            { type: ApplicationCommandOptionType.User, name: "user", description: "Who", required: true },
          ],
        })
    ).toThrow('command "ban": required option "user" must come before optional ones');
  });

  it("rejects connectors that point at unknown options", () => {
    expect(
      () =>
        new SlashCommand({
          name: "ban",
          description: "Ban someone",
          options: [{ type: ApplicationCommandOptionType.User, name: "user", description: "Who" }],
          connectors: { target: "member" },
        })
    ).toThrow('command "ban": connector "target" points at unknown option "member"');
  });

  it("maps option names to handler parameters through connectors", () => {
    const cmd = new SlashCommand({
      name: "ban",
      description: "Ban someone",
      options: [{ type: ApplicationCommandOptionType.String, name: "delete-days", description: "Days" }],
      connectors: { deleteDays: "delete-days" },
    });
    expect(cmd.paramFor("delete-days")).toBe("deleteDays");
    expect(cmd.paramFor("other")).toBe("other");
  });

  describe("sub-commands", () => {
    it("builds groups on first use and renders them nested", () => {
      const cmd = new SlashCommand({ name: "admin", description: "Admin tools" });
      cmd.addSubCommand({ name: "status", description: "Show status", handler: noop });
      const add = cmd.addSubCommand(
        {
          name: "add",
          description: "Add a role",
          options: [{ type: ApplicationCommandOptionType.Role, name: "role", description: "Role", required: true }],
          handler: noop,
        },
        { name: "roles", description: "Role tools" }
      );
      cmd.addSubCommand({ name: "remove", description: "Remove a role", handler: noop }, { name: "roles", description: "Role tools" });

      expect(add.qualifiedName).toBe("admin roles add");
      expect(add.group?.name).toBe("roles");
      expect(cmd.isContainer).toBe(true);
      expect(cmd.toWire().options).toEqual([
        { type: 1, name: "status", description: "Show status" },
        {
          type: 2,
          name: "roles",
          description: "Role tools",
          options: [
            {
              type: 1,
              name: "add",
              description: "Add a role",
              options: [{ type: 8, name: "role", description: "Role", required: true }],
            },
            { type: 1, name: "remove", description: "Remove a role" },
          ],
        },
      ]);
    });

    it("refuses children on a leaf with a handler", () => {
      const cmd = new SlashCommand({ name: "ping", description: "Check latency", handler: noop });
      expect(() => cmd.addSubCommand({ name: "fast", description: "Fast", handler: noop })).toThrow(
        'command "ping" has its own options or handler and cannot take sub-commands'
      );
    });

    it("refuses a group whose name is taken by a sub-command", () => {
      const cmd = new SlashCommand({ name: "admin", description: "Admin tools" });
      cmd.addSubCommand({ name: "roles", description: "Roles", handler: noop });
      expect(() =>
        cmd.addSubCommand({ name: "add", description: "Add", handler: noop }, { name: "roles", description: "Roles" })
      ).toThrow('command "admin" has a sub-command named "roles", not a group');
    });

    it("refuses duplicate sub-command names", () => {
      const cmd = new SlashCommand({ name: "admin", description: "Admin tools" });
      cmd.addSubCommand({ name: "status", description: "Status", handler: noop });
      expect(() => cmd.addSubCommand({ name: "status", description: "Again", handler: noop })).toThrow(
        'command "admin" already has a child "status"'
      );
    });

    it("leaves the group unchanged when the merged group text is invalid", () => {
      const cmd = new SlashCommand({ name: "admin", description: "Admin tools" });
      cmd.addSubCommand({ name: "add", description: "Add", handler: noop }, { name: "roles", description: "Roles" });
      expect(() =>
        cmd.addSubCommand({ name: "remove", description: "Remove", handler: noop }, { name: "roles", description: "" })
      ).toThrow(CommandValidationError);
      const group = cmd.children.get("roles");
      expect(group?.kind).toBe("group");
      expect(group?.kind === "group" ? [...group.children.keys()] : []).toEqual(["add"]);
    });
  });

  describe("checks and error handlers", () => {
    it("runs unit, command, group and sub-command checks in that order", () => {
      const unitCheck: CommandCheck = () => true;
      const rootCheck: CommandCheck = () => true;
      const groupCheck: CommandCheck = () => true;
      const subCheck: CommandCheck = () => true;
      const cmd = new SlashCommand({ name: "admin", description: "Admin tools", checks: [rootCheck] });
      cmd.unit = { name: "admin-unit", checks: [unitCheck] };
      const sub = cmd.addSubCommand(
        { name: "add", description: "Add", handler: noop, checks: [subCheck] },
        { name: "roles", description: "Roles", checks: [groupCheck] }
      );
      expect(sub.effectiveChecks()).toEqual([unitCheck, rootCheck, groupCheck, subCheck]);
    });

    it("falls back from sub-command to group to command", () => {
      const rootHandler: CommandErrorHandler = () => {};
      const groupHandler: CommandErrorHandler = () => {};
      const subHandler: CommandErrorHandler = () => {};
      const cmd = new SlashCommand({ name: "admin", description: "Admin tools", onError: rootHandler });
      const sub = cmd.addSubCommand({ name: "add", description: "Add", handler: noop }, { name: "roles", description: "Roles" });

      expect(sub.resolveErrorHandler()).toBe(rootHandler);
      sub.group?.setErrorHandler(groupHandler);
      expect(sub.resolveErrorHandler()).toBe(groupHandler);
      sub.setErrorHandler(subHandler);
      expect(sub.resolveErrorHandler()).toBe(subHandler);
    });
  });

  it("stores one binding per scope", () => {
    const cmd = new SlashCommand({ name: "ping", description: "Check latency", handler: noop });
    const binding: RemoteBinding = {
      id: "1100000000000000001",
      applicationId: "1000000000000000001",
      guildId: null,
      version: "1",
      createdAt: new Date(0),
      permissions: [],
    };
    cmd.bind(binding);
    expect(cmd.binding(null)).toBe(binding);
    expect(cmd.binding(TEST_GUILD_ID)).toBeUndefined();
    cmd.unbind(null);
    expect(cmd.allBindings()).toEqual([]);
  });

  it("disable drops handlers so invocation becomes a no-op", async () => {
    const handler = vi.fn();
    const cmd = new SlashCommand({ name: "ping", description: "Check latency", handler });
    cmd.disable();
    expect(cmd.disabled).toBe(true);
    await expect(cmd.invoke(makeContext(), {}, vi.fn())).resolves.toBe("noop");
    expect(handler).not.toHaveBeenCalled();
  });

  it("equals a remote entry that differs only by platform defaults", () => {
    const cmd = new SlashCommand({ name: "ping", description: "Check latency", handler: noop });
    expect(cmd.equals({ type: 1, name: "ping", description: "Check latency" })).toBe(true);
    expect(cmd.equals({ type: 1, name: "ping", description: "Old text" })).toBe(false);
  });
});

describe("ContextMenuCommand", () => {
  it("renders an empty description and its kind's type", () => {
    const cmd = new ContextMenuCommand("message", { name: "Report message", handler: noop, guildIds: [TEST_GUILD_ID] });
    expect(cmd.toWire()).toEqual({
      type: 3,
      name: "Report message",
      description: "",
      default_member_permissions: null,
      nsfw: false,
    });
  });

  it("accepts spaces and capitals but not surrounding whitespace", () => {
    expect(() => new ContextMenuCommand("user", { name: " Profile", handler: noop })).toThrow(CommandValidationError);
    expect(new ContextMenuCommand("user", { name: "User Profile", handler: noop }).name).toBe("User Profile");
  });

  it("answers autocomplete with no choices", async () => {
    const responder = createRecordingResponder();
    const cmd = new ContextMenuCommand("user", { name: "Profile", handler: noop });
    await expect(cmd.invokeAutocomplete(makeContext({ responder }), {}, vi.fn())).resolves.toBe("noop");
    expect(responder.autocomplete).toHaveBeenCalledWith([]);
  });
});
