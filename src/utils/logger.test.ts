import { describe, expect, it } from 'vitest';

import { loadConfig } from './config.js';
import logger, { createLogger } from './logger.js';

describe('logger', () => {
  it('takes its level from the loaded config', () => {
    expect(logger.level).toBe(loadConfig().logLevel);
  });

  it('builds a logger at the requested level', () => {
    expect(createLogger('warn').level).toBe('warn');
    expect(createLogger('debug').isLevelEnabled('debug')).toBe(true);
  });
});
