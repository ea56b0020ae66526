#!/usr/bin/env node
import { config } from 'dotenv';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import { loadDebugConfig } from '../config/debug.js';
import { createQueryServer } from '../server/QueryServer.js';
import { logger } from '../utils/logger.js';

config();
// The logger singleton was configured before .env was read
logger.configure(loadDebugConfig());

async function main(): Promise<void> {
  const server = createQueryServer();
  const transport = new StdioServerTransport();
  await server.connect(transport);
  logger.info('Query toolkit MCP server running on stdio');
}

main().catch((error: unknown) => {
  logger.error('Server failed to start', error);
  process.exit(1);
});
