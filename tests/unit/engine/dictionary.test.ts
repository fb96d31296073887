import { EMPTY_DICTIONARY, createWordSetDictionary } from '../../../src/shared/engine/dictionary';

describe('createWordSetDictionary', () => {
  it('trims, case-folds and de-duplicates words', () => {
    const dictionary = createWordSetDictionary([' Roof', 'roof', 'WORM', '', '  ']);
    expect(dictionary.size).toBe(2);
    expect(dictionary.contains('roof')).toBe(true);
    expect(dictionary.contains('Worm')).toBe(true);
    expect(dictionary.contains('fort')).toBe(false);
  });

  it('the empty dictionary contains nothing', () => {
    expect(EMPTY_DICTIONARY.contains('roof')).toBe(false);
  });
});
