// SPDX-License-Identifier: LicenseRef-ANW-1.0
/**
 * Debug script to dump the registered application commands for the global scope
 * and every guild in KNOWN_GUILD_IDS. Read-only; nothing is written.
 */
import { REST } from "discord.js";
import { formatCommandTree } from "../src/commands/format.js";
import { loadEnv } from "../src/lib/env.js";
import { logger } from "../src/lib/logger.js";
import { RestCommandTransport } from "../src/sync/transport.js";

async function main() {
  const config = loadEnv();
  const rest = new REST({ version: "10" }).setToken(config.DISCORD_TOKEN);
  const transport = new RestCommandTransport(rest, config.APPLICATION_ID);

  const scopes: Array<string | null> = [null, ...config.KNOWN_GUILD_IDS];
  for (const guildId of scopes) {
    const label = guildId ? `guild ${guildId}` : "global";
    try {
      const commands = await transport.fetchCommands(guildId);
      console.info(`[commands] ${label}: ${commands.length} command(s)`);
      for (const line of formatCommandTree(commands)) {
        console.info(`  ${line}`);
      }
    } catch (err) {
      logger.warn({ evt: "print_commands_failed", guildId, err }, `[commands] could not read ${label}`);
    }
  }
}

// ESM "am I the main module?" check
const isMainModule = process.argv[1] && import.meta.url.endsWith(process.argv[1].replace(/\\/g, "/"));
if (isMainModule) {
  main().catch((err: unknown) => {
    logger.error({ err }, "[commands] failed");
    process.exitCode = 1;
  });
}
