#!/usr/bin/env node

import { realpathSync } from 'fs';
import { pathToFileURL } from 'url';
import { parseArgs, resolveRuntimeConfig } from './config/cli.js';
import { ConfigError } from './errors/mcpErrors.js';
import { PortalMcpServer } from './server/portalServer.js';
import { log } from './utils/logger.js';

/**
 * Main entry point for the portal MCP server
 */
async function main() {
  let server: PortalMcpServer;
  try {
    const { credentials, settings } = await resolveRuntimeConfig(parseArgs(process.argv.slice(2)), process.env);
    server = new PortalMcpServer({ credentials, settings });
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`Configuration error: ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const signalHandlers = new Map<NodeJS.Signals, () => void>();

  const shutdown = async (signal: string) => {
    log.info(`Received ${signal}, shutting down gracefully...`);

    for (const [eventName, handler] of signalHandlers) {
      process.removeListener(eventName, handler);
    }
    signalHandlers.clear();

    try {
      await server.stop();
      process.exit(0);
    } catch (error) {
      log.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    const handler = () => {
      void shutdown(signal);
    };
    signalHandlers.set(signal, handler);
    process.on(signal, handler);
  }

  try {
    await server.start();
  } catch (error) {
    log.error('Failed to start portal MCP server:', error);
    await server.stop();
    process.exit(1);
  }
}

function isEntryPoint(): boolean {
  const entry = process.argv[1];
  if (!entry) {
    return false;
  }
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

// Only run if this file is executed directly
if (isEntryPoint()) {
  main().catch((error) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
}
