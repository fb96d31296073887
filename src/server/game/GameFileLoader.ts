import fs from 'fs';
import path from 'path';
import { GameEngine } from '../../shared/engine/GameEngine';
import { isEngineError } from '../../shared/engine/errors';
import { loadGame, splitGameText } from '../../shared/engine/gameLoader';
import type { LoadedGame } from '../../shared/engine/types';
import type { GameOptionsInput } from '../../shared/validation/schemas';
import { config } from '../config';
import { logger } from '../utils/logger';
import { WordListDictionary } from './WordListDictionary';

const GAME_FILE_EXTENSION = '.txt';

/**
 * Read and validate a game file from disk.
 *
 * @throws InvalidGame when the file content is not a valid game; fs errors
 *   (missing file, permissions) propagate unchanged
 */
export function readGameFile(filePath: string): LoadedGame {
  const text = fs.readFileSync(filePath, 'utf-8');
  try {
    const game = loadGame(splitGameText(text));
    logger.debug('Loaded game file', {
      file: filePath,
      theme: game.theme,
      rows: game.board.numRows(),
      cols: game.board.numCols(),
      answers: game.answers.length,
    });
    return game;
  } catch (error) {
    if (isEngineError(error)) {
      logger.warn('Rejected game file', { file: filePath, code: error.code, reason: error.message });
    }
    throw error;
  }
}

/**
 * Game files in a directory, sorted by name.
 */
export function listGameFiles(dir: string): string[] {
  return fs
    .readdirSync(dir, { withFileTypes: true })
    .filter((entry) => entry.isFile() && path.extname(entry.name) === GAME_FILE_EXTENSION)
    .map((entry) => path.join(dir, entry.name))
    .sort();
}

/**
 * Engine options from the unified config: the configured hint threshold and
 * the word list at `STRANDS_WORDS_FILE`.
 */
export function configuredGameOptions(): GameOptionsInput {
  return {
    hintThreshold: config.game.hintThreshold,
    dictionary: WordListDictionary.fromFile(config.game.wordsFile),
  };
}

/**
 * Start an engine on a game file. Without explicit options the engine uses
 * {@link configuredGameOptions}.
 */
export function createEngineFromFile(filePath: string, options?: GameOptionsInput): GameEngine {
  const game = readGameFile(filePath);
  return new GameEngine(game, options ?? configuredGameOptions());
}
