/**
 * Tests for the unified config and the winston logger built from it.
 */

import winston from 'winston';
import { config } from '../../src/server/config';
import { logger } from '../../src/server/utils/logger';

describe('config', () => {
  it('reflects the test environment', () => {
    expect(config.nodeEnv).toBe('test');
    expect(config.logging.level).toBe('error');
  });

  it('carries game defaults', () => {
    expect(config.game).toEqual({
      hintThreshold: 3,
      boardsDir: 'boards',
      wordsFile: 'assets/words.txt',
    });
  });

  it('is frozen', () => {
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.game)).toBe(true);
  });
});

describe('logger', () => {
  it('uses the configured level and service metadata', () => {
    expect(logger.level).toBe('error');
    expect(logger.defaultMeta).toEqual({ service: 'strands-engine', environment: 'test' });
  });

  it('logs to the console only when no LOG_FILE is set', () => {
    expect(logger.transports).toHaveLength(1);
    expect(logger.transports[0]).toBeInstanceOf(winston.transports.Console);
  });
});
