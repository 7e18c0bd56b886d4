#!/usr/bin/env node
import process from 'node:process';

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { ConfigResolver, loadServerOptions } from './config.js';
import { createLogger } from './logger.js';
import { HomeSeerClient } from './homeseer/client.js';
import { buildMcpServer } from './mcp/server.js';

async function main(): Promise<void> {
  const serverOptions = loadServerOptions();
  const logger = createLogger(serverOptions.logLevel, serverOptions.logPretty);

  const config = new ConfigResolver({ logger }).get();
  const client = new HomeSeerClient({ config, logger });

  const server = buildMcpServer({ logger, client });
  const transport = new StdioServerTransport();
  await server.connect(transport);

  logger.info(
    {
      transport: 'stdio',
      url: config.url,
      source: config.source
    },
    'homeseer-mcp running on stdio'
  );

  const shutdown = async () => {
    logger.info('Shutting down stdio server');
    await server.close();
    await client.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((error: unknown) => {
      logger.error({ error }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
}

main().catch((error) => {
  const text = error instanceof Error ? error.stack ?? error.message : String(error);
  console.error(text);
  process.exit(1);
});
