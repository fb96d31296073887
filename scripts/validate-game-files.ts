#!/usr/bin/env ts-node
/**
 * Game File Validation Script
 *
 * Loads every game file in the boards directory and reports whether it is a
 * playable puzzle. Answers whose strands fold over themselves or revisit a
 * cell are reported as warnings.
 *
 * Usage:
 *   npx ts-node scripts/validate-game-files.ts [dir]
 *   npm run validate:boards
 */

import * as path from 'path';
import { config } from '../src/server/config';
import { listGameFiles, readGameFile } from '../src/server/game/GameFileLoader';
import { wrapEngineError } from '../src/shared/engine/errors';
import { formatAnswerLine } from '../src/shared/engine/notation';

interface ValidationResult {
  file: string;
  valid: boolean;
  errors: string[];
  warnings: string[];
}

export interface GameFileValidationResult {
  ok: boolean;
  results: ValidationResult[];
}

function validateGameFile(filePath: string): ValidationResult {
  const result: ValidationResult = { file: filePath, valid: true, errors: [], warnings: [] };

  try {
    const game = readGameFile(filePath);
    for (const answer of game.answers) {
      if (answer.strand.isFolded()) {
        result.warnings.push(`answer folds over itself: ${formatAnswerLine(answer)}`);
      }
      if (answer.strand.isCyclic()) {
        result.warnings.push(`answer visits a cell twice: ${formatAnswerLine(answer)}`);
      }
    }
  } catch (error) {
    const engineError = wrapEngineError(error, 'GameFileValidation', { file: filePath });
    result.valid = false;
    result.errors.push(`${engineError.code}: ${engineError.message}`);
  }

  return result;
}

export function validateGameFiles(dir: string = config.game.boardsDir): GameFileValidationResult {
  const results = listGameFiles(dir).map(validateGameFile);
  return { ok: results.every((r) => r.valid), results };
}

function printResults(results: ValidationResult[]): boolean {
  let totalErrors = 0;
  let totalWarnings = 0;

  console.log('\n' + '='.repeat(60));
  console.log('GAME FILE VALIDATION');
  console.log('='.repeat(60) + '\n');

  for (const result of results) {
    console.log(`${result.valid ? '✅' : '❌'} ${result.file}`);

    for (const error of result.errors) {
      console.log(`   ❌ ERROR: ${error}`);
      totalErrors++;
    }

    for (const warning of result.warnings) {
      console.log(`   ⚠️  WARNING: ${warning}`);
      totalWarnings++;
    }
  }

  console.log('\n' + '='.repeat(60));
  console.log(`SUMMARY: ${results.length} files, ${totalErrors} errors, ${totalWarnings} warnings`);
  console.log('='.repeat(60) + '\n');

  return totalErrors === 0;
}

function main(): void {
  const dir = process.argv[2] ? path.resolve(process.argv[2]) : config.game.boardsDir;
  const { results } = validateGameFiles(dir);
  if (results.length === 0) {
    console.log(`❌ No game files found in ${dir}\n`);
    process.exit(1);
  }
  process.exit(printResults(results) ? 0 : 1);
}

if (require.main === module) {
  main();
}
