import fs from 'fs';
import { createWordSetDictionary, type WordSetDictionary } from '../../shared/engine/dictionary';
import type { Dictionary } from '../../shared/engine/types';
import { logger } from '../utils/logger';

function isComment(line: string): boolean {
  return line.trim().startsWith('#');
}

/**
 * Dictionary backed by a plain word list: one word per line, blank lines
 * and `#` comments ignored, case-folded.
 */
export class WordListDictionary implements Dictionary {
  private readonly words: WordSetDictionary;

  constructor(lines: Iterable<string>) {
    this.words = createWordSetDictionary([...lines].filter((line) => !isComment(line)));
  }

  static fromFile(filePath: string): WordListDictionary {
    const text = fs.readFileSync(filePath, 'utf-8');
    const dictionary = new WordListDictionary(text.split(/\r?\n/));
    logger.info('Loaded word list', { file: filePath, words: dictionary.size });
    return dictionary;
  }

  get size(): number {
    return this.words.size;
  }

  contains(word: string): boolean {
    return this.words.contains(word);
  }
}
