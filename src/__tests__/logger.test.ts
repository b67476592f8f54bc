import { describe, it, expect } from 'vitest';
import { logger } from '../logger.js';
import { LOG_PATH } from '../config.js';

describe('logger', () => {
  it('should take its level from BUOYTERM_LOG_LEVEL', () => {
    expect(process.env.BUOYTERM_LOG_LEVEL).toBe('silent');
    expect(logger.level).toBe('silent');
  });

  it('should write to the path in BUOYTERM_LOG_PATH', () => {
    expect(process.env.BUOYTERM_LOG_PATH).toBeDefined();
    expect(LOG_PATH).toBe(process.env.BUOYTERM_LOG_PATH);
  });
});
