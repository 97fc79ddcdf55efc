/**
 * slash-registry — tests/dispatch/engine.test.ts
 * WHAT: Routing through the tree, argument binding and where failures go.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { type Mock, describe, it, expect, vi, beforeEach } from "vitest";
import { ApplicationCommandOptionType } from "discord.js";

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

// Real redaction, recorded log calls
vi.mock("../../src/lib/logger.js", async (importOriginal) => {
  const actual = await importOriginal<typeof import("../../src/lib/logger.js")>();
  return { logger: mockLogger, redact: actual.redact };
});

import { CommandRegistry, defineUnit } from "../../src/commands/registry.js";
import type { CommandHandler, ErrorSink } from "../../src/commands/types.js";
import { DispatchEngine } from "../../src/dispatch/engine.js";
import type { ResolvedBundle } from "../../src/dispatch/payload.js";
import { CheckFailureError, RoutingError } from "../../src/lib/errors.js";
import { TEST_GUILD_ID, chatPayload, contextPayload, createRecordingResponder } from "../utils/payloads.js";

const OPTION = ApplicationCommandOptionType;
const TARGET_ID = "2000000000000000002";

const resolved: ResolvedBundle = {
  users: { [TARGET_ID]: { id: TARGET_ID, username: "target" } },
  members: { [TARGET_ID]: { roles: [], joined_at: "2024-01-01T00:00:00.000Z" } },
};

describe("DispatchEngine", () => {
  let registry: CommandRegistry;
  let sink: Mock<ErrorSink>;
  let engine: DispatchEngine;

  beforeEach(() => {
    registry = new CommandRegistry();
    sink = vi.fn<ErrorSink>();
    engine = new DispatchEngine(registry, { errorSink: sink });
  });

  it("routes command → group → sub-command and resolves a member argument", async () => {
    const handler = vi.fn<CommandHandler>();
    const add = registry.subCommand({
      parent: { name: "admin", description: "Admin tools" },
      group: { name: "roles", description: "Role tools" },
      name: "add",
      description: "Add a role",
      options: [{ type: OPTION.User, name: "user", description: "Who", required: true }],
      handler,
    });

    const payload = chatPayload(
      "admin",
      [
        {
          name: "roles",
          type: OPTION.SubcommandGroup,
          options: [{ name: "add", type: OPTION.Subcommand, options: [{ name: "user", type: OPTION.User, value: TARGET_ID }] }],
        },
      ],
      { resolved }
    );

    await expect(engine.dispatch(payload)).resolves.toEqual({ status: "invoked", node: add, outcome: "completed" });
    expect(handler).toHaveBeenCalledOnce();
    const [ctx, args] = handler.mock.calls[0];
    expect(ctx.command).toBe(add);
    expect(ctx.isAutocomplete).toBe(false);
    expect(args).toEqual({
      user: { roles: [], joined_at: "2024-01-01T00:00:00.000Z", user: { id: TARGET_ID, username: "target" } },
    });
    expect(sink).not.toHaveBeenCalled();
  });

  it("routes a direct sub-command", async () => {
    const handler = vi.fn<CommandHandler>();
    registry.subCommand({ parent: { name: "admin" }, name: "status", description: "Status", handler });
    const outcome = await engine.dispatch(chatPayload("admin", [{ name: "status", type: OPTION.Subcommand, options: [] }]));
    expect(outcome.status).toBe("invoked");
    expect(handler).toHaveBeenCalledWith(expect.anything(), {});
  });

  it("sends an unknown command to the sink exactly once", async () => {
    const handler = vi.fn<CommandHandler>();
    registry.slashCommand({ name: "ping", description: "Check latency", handler });

    const outcome = await engine.dispatch(chatPayload("missing"));
    expect(outcome.status).toBe("routing_error");
    expect(handler).not.toHaveBeenCalled();
    expect(sink).toHaveBeenCalledOnce();
    const [node, , error] = sink.mock.calls[0];
    expect(node).toBeNull();
    expect(error).toBeInstanceOf(RoutingError);
    expect(error instanceof Error ? error.message : null).toBe('unknown command "missing" in scope global');
  });

  it("redacts user-supplied names in the routing log", async () => {
    await engine.dispatch(chatPayload("@everyone"));
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "dispatch_routing_error", path: ["@redacted"] }),
      '[dispatch] unknown command "@redacted" in scope global'
    );
  });

  it("only finds guild commands in their guild", async () => {
    const handler = vi.fn<CommandHandler>();
    registry.slashCommand({ name: "ping", description: "Check latency", handler, guildIds: [TEST_GUILD_ID] });

    expect((await engine.dispatch(chatPayload("ping"))).status).toBe("routing_error");
    expect((await engine.dispatch(chatPayload("ping", [], { guildId: TEST_GUILD_ID }))).status).toBe("invoked");
    expect(handler).toHaveBeenCalledOnce();
    expect(handler.mock.calls[0][0].guildId).toBe(TEST_GUILD_ID);
  });

  it("rejects a container invoked without a sub-command", async () => {
    registry.subCommand({ parent: { name: "admin" }, name: "status", description: "Status", handler: vi.fn() });
    const outcome = await engine.dispatch(chatPayload("admin"));
    expect(outcome.status === "routing_error" ? outcome.error.message : null).toBe('command "admin" needs a sub-command');
  });

  it("rejects an unknown sub-command with the full path", async () => {
    registry.subCommand({ parent: { name: "admin" }, name: "status", description: "Status", handler: vi.fn() });
    const outcome = await engine.dispatch(chatPayload("admin", [{ name: "gone", type: OPTION.Subcommand, options: [] }]));
    expect(outcome.status === "routing_error" ? [outcome.error.message, outcome.error.path] : null).toEqual([
      'unknown sub-command "admin gone"',
      ["admin", "gone"],
    ]);
  });

  it("does not invoke retired commands", async () => {
    const handler = vi.fn<CommandHandler>();
    const unit = defineUnit({
      name: "basics",
      register: (r) => void r.slashCommand({ name: "ping", description: "Check latency", handler }),
    });
    const [ping] = registry.loadUnit(unit);
    ping.bind({
      id: "1100000000000000001",
      applicationId: "1000000000000000001",
      guildId: null,
      version: "1",
      createdAt: new Date(0),
      permissions: [],
    });
    registry.unloadUnit("basics");

    expect((await engine.dispatch(chatPayload("ping"))).status).toBe("routing_error");
    expect(handler).not.toHaveBeenCalled();
  });

  it("lets the command's error handler see a handler error once", async () => {
    const boom = new Error("handler failed");
    const onError = vi.fn();
    registry.slashCommand({
      name: "ping",
      description: "Check latency",
      handler: () => {
        throw boom;
      },
      onError,
    });

    const outcome = await engine.dispatch(chatPayload("ping"));
    expect(outcome.status === "invoked" ? outcome.outcome : null).toBe("errored");
    expect(onError).toHaveBeenCalledOnce();
    expect(onError.mock.calls[0][1]).toBe(boom);
    expect(sink).not.toHaveBeenCalled();
  });

  it("reports a failed check to the sink", async () => {
    const handler = vi.fn<CommandHandler>();
    registry.slashCommand({ name: "ping", description: "Check latency", handler, checks: [() => false] });

    const outcome = await engine.dispatch(chatPayload("ping"));
    expect(outcome.status === "invoked" ? outcome.outcome : null).toBe("check_failed");
    expect(handler).not.toHaveBeenCalled();
    expect(sink.mock.calls[0][2]).toBeInstanceOf(CheckFailureError);
  });

  describe("autocomplete", () => {
    it("passes the focused option and injected defaults", async () => {
      const complete = vi.fn<CommandHandler>();
      registry.slashCommand({
        name: "search",
        description: "Search",
        options: [
          { type: OPTION.String, name: "query", description: "Query", required: true, autocomplete: true },
          { type: OPTION.Integer, name: "limit", description: "Limit", default: 10 },
        ],
        handler: vi.fn(),
        autocomplete: complete,
      });

      const payload = chatPayload("search", [{ name: "query", type: OPTION.String, value: "ab", focused: true }], {
        autocomplete: true,
      });
      const outcome = await engine.dispatch(payload);

      expect(outcome.status === "invoked" ? outcome.outcome : null).toBe("completed");
      const [ctx, args] = complete.mock.calls[0];
      expect(ctx.isAutocomplete).toBe(true);
      expect(ctx.focused).toEqual({ name: "query", value: "ab" });
      expect(args).toEqual({ query: "ab", limit: 10 });
    });

    it("answers with no choices when the command has no autocomplete handler", async () => {
      const responder = createRecordingResponder();
      const withResponder = new DispatchEngine(registry, { errorSink: sink, responderFor: () => responder });
      registry.slashCommand({
        name: "search",
        description: "Search",
        options: [{ type: OPTION.String, name: "query", description: "Query", autocomplete: true }],
        handler: vi.fn(),
      });

      const payload = chatPayload("search", [{ name: "query", type: OPTION.String, value: "a", focused: true }], {
        autocomplete: true,
      });
      const outcome = await withResponder.dispatch(payload);
      expect(outcome.status === "invoked" ? outcome.outcome : null).toBe("noop");
      expect(responder.autocomplete).toHaveBeenCalledWith([]);
    });
  });

  it("gives context menu handlers the resolved target", async () => {
    const handler = vi.fn<CommandHandler>();
    const responder = createRecordingResponder();
    const withResponder = new DispatchEngine(registry, { errorSink: sink, responderFor: () => responder });
    registry.userCommand({ name: "Profile", handler });

    await withResponder.dispatch(contextPayload("user", "Profile", TARGET_ID, { users: resolved.users }));
    const [ctx, args] = handler.mock.calls[0];
    expect(args).toEqual({ target: { id: TARGET_ID, username: "target" } });
    expect(ctx.responder).toBe(responder);
  });
});
