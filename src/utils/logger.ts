import { pino } from 'pino';

import { loadConfig } from './config.js';

export function createLogger(level: string) {
  return pino({
    name: 'notes-core',
    level,
    formatters: {
      level: (label) => ({ level: label }),
    },
  });
}

const logger = createLogger(loadConfig().logLevel);

export default logger;
