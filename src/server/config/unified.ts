/**
 * Unified Application Configuration
 *
 * Parses environment variables, validates them with Zod, and exports a
 * frozen config object that all server code should use.
 *
 * Usage:
 *   import { config } from './config';
 */

import dotenv from 'dotenv';
import { parseEnv, getEffectiveNodeEnv, type LogFormat, type LogLevel, type NodeEnv } from './env';

// Load .env into process.env before we read anything from it. Skipped in
// test mode so a developer's .env cannot override test settings.
if (process.env.NODE_ENV !== 'test') {
  dotenv.config();
}

const envResult = parseEnv(process.env);
if (!envResult.success || !envResult.data) {
  console.error('❌ Invalid environment configuration:');
  for (const error of envResult.errors ?? []) {
    console.error(`  - ${error.path || 'root'}: ${error.message}`);
  }
  process.exit(1);
}
const env = envResult.data;

const nodeEnv = getEffectiveNodeEnv(env);

export interface AppConfig {
  nodeEnv: NodeEnv;
  logging: {
    level: LogLevel;
    format: LogFormat;
    file: string | undefined;
  };
  game: {
    hintThreshold: number;
    boardsDir: string;
    wordsFile: string;
  };
}

export const config: Readonly<AppConfig> = Object.freeze({
  nodeEnv,
  logging: Object.freeze({
    level: env.LOG_LEVEL,
    format: env.LOG_FORMAT,
    file: env.LOG_FILE?.trim() || undefined,
  }),
  game: Object.freeze({
    hintThreshold: env.STRANDS_HINT_THRESHOLD,
    boardsDir: env.STRANDS_BOARDS_DIR,
    wordsFile: env.STRANDS_WORDS_FILE,
  }),
});
