/**
 * Rule constants shared by the loader and the engine.
 *
 * Theme answers in a game file may be as short as three letters, while
 * words a player traces during play must be at least four letters long to
 * be checked against the word list. Theme answers are matched before the
 * length rule applies, so three-letter answers remain findable.
 */
export const MIN_ANSWER_WORD_LENGTH = 3;

export const MIN_SUBMITTED_WORD_LENGTH = 4;

/** Number of non-theme words needed to earn a hint. */
export const DEFAULT_HINT_THRESHOLD = 3;
