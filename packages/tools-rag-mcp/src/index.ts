#!/usr/bin/env node
import process from 'node:process';
import { createLogger } from '@paperqa/tools-core';
import dotenv from 'dotenv';
import { hideBin } from 'yargs/helpers';
import { loadServerConfig, startServer } from './server.js';

const log = createLogger('server');

dotenv.config();

try {
  const config = await loadServerConfig(hideBin(process.argv), process.env);
  await startServer(config);
} catch (error: unknown) {
  log.error('Failed to start the MCP server:', error);
  process.exit(1);
}
