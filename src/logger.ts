import pino from 'pino';

import { APP_NAME, LOG_PATH } from './config.js';

// The TUI owns stdout, so logs go to a file under the data directory.
export const logger = pino(
  {
    name: APP_NAME,
    level: process.env.BUOYTERM_LOG_LEVEL || 'info',
  },
  pino.destination({ dest: LOG_PATH, mkdir: true, sync: true })
);
