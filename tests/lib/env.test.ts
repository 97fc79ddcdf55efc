/**
 * slash-registry — tests/lib/env.test.ts
 * WHAT: Proves the zod environment schema validates required vars and defaults the rest.
 * parseEnv takes the source object directly, so nothing here touches process.env.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { describe, it, expect } from "vitest";
import { parseEnv } from "../../src/lib/env.js";
import { ConfigError } from "../../src/lib/errors.js";

const minimal = {
  DISCORD_TOKEN: "test-secret",
  APPLICATION_ID: "1000000000000000001",
};

describe("parseEnv", () => {
  it("applies defaults to a minimal environment", () => {
    const config = parseEnv(minimal);
    expect(config).toMatchObject({
      DISCORD_TOKEN: "test-secret",
      APPLICATION_ID: "1000000000000000001",
      NODE_ENV: "development",
      SYNC_COMMANDS: true,
      SYNC_ON_RELOAD: false,
      DELETE_UNKNOWN_COMMANDS: true,
      DELETE_ON_RELOAD: false,
      SYNC_GUILD_TIMEOUT_MS: 10_000,
      SYNC_GUILD_CONCURRENCY: 1,
      KNOWN_GUILD_IDS: [],
      SENTRY_TRACES_SAMPLE_RATE: 0.1,
    });
  });

  it("accepts CLIENT_ID as the application id", () => {
    const config = parseEnv({ DISCORD_TOKEN: "test-secret", CLIENT_ID: "1000000000000000002" });
    expect(config.APPLICATION_ID).toBe("1000000000000000002");
  });

  it("prefers APPLICATION_ID over CLIENT_ID", () => {
    const config = parseEnv({ ...minimal, CLIENT_ID: "1000000000000000002" });
    expect(config.APPLICATION_ID).toBe("1000000000000000001");
  });

  it.each([
    ["yes", true],
    ["ON", true],
    ["1", true],
    ["false", false],
    ["0", false],
  ])("reads flag value %s as %s", (raw, expected) => {
    expect(parseEnv({ ...minimal, SYNC_ON_RELOAD: raw }).SYNC_ON_RELOAD).toBe(expected);
  });

  it("treats blank values as unset", () => {
    expect(parseEnv({ ...minimal, SYNC_COMMANDS: "   " }).SYNC_COMMANDS).toBe(true);
  });

  it("splits and trims KNOWN_GUILD_IDS", () => {
    const config = parseEnv({ ...minimal, KNOWN_GUILD_IDS: "3000000000000000001, 3000000000000000002," });
    expect(config.KNOWN_GUILD_IDS).toEqual(["3000000000000000001", "3000000000000000002"]);
  });

  it("coerces numeric settings", () => {
    const config = parseEnv({ ...minimal, SYNC_GUILD_TIMEOUT_MS: "2500", SYNC_GUILD_CONCURRENCY: "4" });
    expect(config.SYNC_GUILD_TIMEOUT_MS).toBe(2500);
    expect(config.SYNC_GUILD_CONCURRENCY).toBe(4);
  });

  it("lists every issue in one ConfigError", () => {
    try {
      parseEnv({ APPLICATION_ID: "not-a-snowflake", SYNC_GUILD_CONCURRENCY: "11" });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigError);
      if (err instanceof ConfigError) {
        expect(err.issues).toEqual([
          "- DISCORD_TOKEN: Missing DISCORD_TOKEN",
          "- APPLICATION_ID: APPLICATION_ID must be a snowflake",
          "- SYNC_GUILD_CONCURRENCY: Number must be less than or equal to 10",
        ]);
      }
    }
  });

  it("rejects malformed guild ids", () => {
    expect(() => parseEnv({ ...minimal, KNOWN_GUILD_IDS: "123" })).toThrow(
      "KNOWN_GUILD_IDS must be a comma-separated list of snowflakes"
    );
  });
});
