/** Header keywords, matched case-insensitively at the start of a trimmed line. */
export const ArffKeywords = {
  RELATION: '@relation',
  ATTRIBUTE: '@attribute',
  DATA: '@data',
} as const;

/** Lines starting with this character are comments. */
export const COMMENT_PREFIX = '%';

/** A cell consisting of exactly this text is a missing value. */
export const MISSING_VALUE = '?';
