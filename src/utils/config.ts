import dotenv from 'dotenv';
import type { AppConfig } from '../types/index.js';

dotenv.config();

export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  if (env.LOG_LEVEL) {
    return env.LOG_LEVEL;
  }
  // Keep test output clean unless a level is asked for explicitly
  return env.VITEST ? 'silent' : 'info';
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    storage: {
      dataDir: env.DATA_DIR || './data',
      fileName: env.NOTES_FILE || 'notes.json',
    },
    server: {
      port: parseInt(env.PORT || '3000', 10),
      host: env.HOST || '0.0.0.0',
    },
    logLevel: resolveLogLevel(env),
  };
}
