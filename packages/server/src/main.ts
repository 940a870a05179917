#!/usr/bin/env node
import { getErrorMessage } from '@creditledger/core';
import { startServer } from './index.js';
import { createLogger } from './lib/logger.js';

startServer().catch((err) => {
  createLogger('Server').error('Failed to start', { error: getErrorMessage(err) });
  process.exit(1);
});
