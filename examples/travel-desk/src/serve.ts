/**
 * Local entry point for the travel desk.
 *
 * Run with: npm start
 * Settings come from the environment, then `.dev.vars` / `.env`.
 */

import { ConciergeServer, createLogger } from '@concierge/core';
import { startLocalServer, loadEnvFile } from '@concierge/core/node';
import { SettingsError, parseSettings } from '@concierge/travel-tools';
import { config } from './config.js';
import { createDeskStore } from './store.js';
import { deskTools } from './tools.js';

const env: Record<string, unknown> = { ...loadEnvFile(), ...process.env };

async function main(): Promise<void> {
  const settings = parseSettings(env);
  const logger = createLogger({ name: config.mcp.serverName, level: settings.logLevel });

  const runtimeConfig = {
    ...config,
    storage: { tablePrefix: settings.tablePrefix },
  };

  const store = await createDeskStore(settings, logger, runtimeConfig.storage.tablePrefix);
  const server = new ConciergeServer({
    config: runtimeConfig,
    store,
    logger,
    tools: deskTools(settings),
    debugMode: env['DEBUG'] === 'true',
  });

  startLocalServer(server, { port: settings.port });
}

main().catch((err: unknown) => {
  if (err instanceof SettingsError) {
    console.error(err.message);
  } else {
    console.error(err);
  }
  process.exitCode = 1;
});
