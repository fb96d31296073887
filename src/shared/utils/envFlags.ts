// Shared helpers for reading environment flags from engine code. The engine
// itself stays free of any logging library; trace output is plain console
// output gated by an environment flag.

type ProcessEnv = Record<string, string | undefined>;
function getProcessEnv(): ProcessEnv | undefined {
  if (typeof process !== 'undefined' && typeof process.env === 'object') {
    return process.env;
  }
  return undefined;
}

export function readEnv(name: string): string | undefined {
  const env = getProcessEnv();
  if (env) {
    const value = env[name];
    if (typeof value === 'string') {
      return value;
    }
  }

  return undefined;
}

/**
 * Returns true if running inside a Jest worker process, even when NODE_ENV
 * was set to something else by a .env file.
 */
export function isJestRuntime(): boolean {
  return readEnv('JEST_WORKER_ID') !== undefined;
}

export function flagEnabled(name: string): boolean {
  const raw = readEnv(name);
  if (!raw) return false;
  return raw === '1' || raw === 'true' || raw === 'TRUE';
}

/**
 * STRANDS_ENGINE_TRACE=1 prints every submission and hint decision made by
 * the engine.
 */
export function isEngineTraceEnabled(): boolean {
  return flagEnabled('STRANDS_ENGINE_TRACE');
}

/**
 * Debug logging wrapper. The wrapped console.log is only invoked if the
 * condition is true.
 *
 * @example
 * debugLog(isEngineTraceEnabled(), '[GameEngine] submit', outcome);
 */
export function debugLog(condition: boolean, ...args: unknown[]): void {
  if (condition) {
    // eslint-disable-next-line no-console
    console.log(...args);
  }
}
