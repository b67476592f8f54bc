#!/usr/bin/env node

import { createProgram } from './cli.js';
import { failFast, installFatalHandlers } from './fatal.js';
import { logger } from './logger.js';
import { runViewer } from './viewer.js';

installFatalHandlers();

const program = createProgram(async (kind, config) => {
  await runViewer(kind, { config });
  logger.info('Exiting');
  process.exit(0);
});

program.parseAsync().catch(failFast);
