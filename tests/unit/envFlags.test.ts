import {
  readEnv,
  flagEnabled,
  isJestRuntime,
  isEngineTraceEnabled,
  debugLog,
} from '../../src/shared/utils/envFlags';

describe('envFlags helpers', () => {
  const originalEnv = process.env;

  beforeEach(() => {
    process.env = { ...originalEnv };
  });

  afterEach(() => {
    process.env = originalEnv;
    jest.restoreAllMocks();
  });

  it('readEnv reads from process.env when present', () => {
    delete process.env.STRANDS_TEST_FLAG;
    expect(readEnv('STRANDS_TEST_FLAG')).toBeUndefined();

    process.env.STRANDS_TEST_FLAG = 'abc';
    expect(readEnv('STRANDS_TEST_FLAG')).toBe('abc');
  });

  it('flagEnabled accepts 1 and true only', () => {
    for (const value of ['1', 'true', 'TRUE']) {
      process.env.STRANDS_TEST_FLAG = value;
      expect(flagEnabled('STRANDS_TEST_FLAG')).toBe(true);
    }
    for (const value of ['', '0', 'false', 'yes']) {
      process.env.STRANDS_TEST_FLAG = value;
      expect(flagEnabled('STRANDS_TEST_FLAG')).toBe(false);
    }
  });

  it('detects the Jest runtime', () => {
    expect(isJestRuntime()).toBe(true);
  });

  it('isEngineTraceEnabled follows STRANDS_ENGINE_TRACE', () => {
    delete process.env.STRANDS_ENGINE_TRACE;
    expect(isEngineTraceEnabled()).toBe(false);
    process.env.STRANDS_ENGINE_TRACE = '1';
    expect(isEngineTraceEnabled()).toBe(true);
  });

  it('debugLog only prints when the condition holds', () => {
    const log = jest.spyOn(console, 'log').mockImplementation(() => undefined);

    debugLog(false, 'hidden');
    expect(log).not.toHaveBeenCalled();

    debugLog(true, '[GameEngine] submitStrand', 'roof');
    expect(log).toHaveBeenCalledWith('[GameEngine] submitStrand', 'roof');
  });
});
