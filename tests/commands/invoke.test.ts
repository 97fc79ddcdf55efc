/**
 * slash-registry — tests/commands/invoke.test.ts
 * WHAT: Check chain, handler outcomes and where errors end up.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect, vi } from "vitest";

const { mockLogger } = vi.hoisted(() => ({
  mockLogger: { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() },
}));

vi.mock("../../src/lib/logger.js", () => ({ logger: mockLogger }));

import { answerWithoutHandler, routeError, runInvocation } from "../../src/commands/invoke.js";
import { SlashCommand } from "../../src/commands/nodes.js";
import type { ErrorSink } from "../../src/commands/types.js";
import { CheckFailureError } from "../../src/lib/errors.js";
import { createRecordingResponder, makeContext } from "../utils/payloads.js";

function leaf(onError?: (ctx: unknown, error: unknown) => unknown) {
  return new SlashCommand({ name: "ping", description: "Check latency", handler: () => {}, onError });
}

describe("runInvocation", () => {
  it("runs the body when every check passes", async () => {
    const node = leaf();
    node.addCheck(() => true).addCheck(async () => true);
    const body = vi.fn();
    const sink = vi.fn<ErrorSink>();
    await expect(runInvocation(node, makeContext(), sink, body)).resolves.toBe("completed");
    expect(body).toHaveBeenCalledOnce();
    expect(sink).not.toHaveBeenCalled();
  });

  it("stops at the first failing check and reports a CheckFailureError", async () => {
    const node = leaf();
    const later = vi.fn(() => true);
    node.addCheck(() => false).addCheck(later);
    const body = vi.fn();
    const sink = vi.fn<ErrorSink>();

    await expect(runInvocation(node, makeContext(), sink, body)).resolves.toBe("check_failed");
    expect(later).not.toHaveBeenCalled();
    expect(body).not.toHaveBeenCalled();
    expect(sink).toHaveBeenCalledOnce();
    const error = sink.mock.calls[0][2];
    expect(error).toBeInstanceOf(CheckFailureError);
    expect(error instanceof CheckFailureError ? error.command : null).toBe("ping");
  });

  it("treats a throwing check as a failed check", async () => {
    const node = leaf();
    const boom = new Error("check blew up");
    node.addCheck(() => {
      throw boom;
    });
    const sink = vi.fn<ErrorSink>();
    await expect(runInvocation(node, makeContext(), sink, vi.fn())).resolves.toBe("check_failed");
    expect(sink).toHaveBeenCalledWith(node, expect.anything(), boom);
  });

  it("gives a handler error to the node's error handler exactly once", async () => {
    const onError = vi.fn();
    const node = leaf(onError);
    const sink = vi.fn<ErrorSink>();
    const boom = new Error("handler failed");

    await expect(
      runInvocation(node, makeContext(), sink, () => {
        throw boom;
      })
    ).resolves.toBe("errored");
    expect(onError).toHaveBeenCalledOnce();
    expect(onError.mock.calls[0][1]).toBe(boom);
    expect(sink).not.toHaveBeenCalled();
  });

  it("awaits asynchronous bodies", async () => {
    const sink = vi.fn<ErrorSink>();
    await expect(runInvocation(leaf(), makeContext(), sink, async () => Promise.reject(new Error("later")))).resolves.toBe(
      "errored"
    );
    expect(sink).toHaveBeenCalledOnce();
  });
});

describe("routeError", () => {
  it("sends what the error handler throws to the sink", async () => {
    const second = new Error("handler of handler");
    const node = leaf(() => {
      throw second;
    });
    const sink = vi.fn<ErrorSink>();
    await routeError(node, makeContext(), new Error("first"), sink);
    expect(sink).toHaveBeenCalledOnce();
    expect(sink.mock.calls[0][2]).toBe(second);
  });

  it("logs a throwing sink instead of rethrowing", async () => {
    const sink = vi.fn<ErrorSink>(() => {
      throw new Error("sink broke");
    });
    await expect(routeError(leaf(), makeContext(), new Error("x"), sink)).resolves.toBeUndefined();
    expect(mockLogger.error).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "error_sink_failed", cmd: "ping", traceId: "testtrace01" }),
      "[invoke] error sink threw"
    );
  });
});

describe("answerWithoutHandler", () => {
  it("answers with an empty choice list", async () => {
    const responder = createRecordingResponder();
    const ctx = makeContext({ responder, isAutocomplete: true, focused: { name: "query", value: "ab" } });
    await expect(answerWithoutHandler(leaf(), ctx)).resolves.toBe("noop");
    expect(responder.autocomplete).toHaveBeenCalledWith([]);
    expect(mockLogger.warn).toHaveBeenCalledWith(
      expect.objectContaining({ evt: "autocomplete_no_handler", option: "query" }),
      "[invoke] ping has no autocomplete handler"
    );
  });

  it("works without a responder", async () => {
    await expect(answerWithoutHandler(leaf(), makeContext())).resolves.toBe("noop");
  });
});
