const NON_WORD_RE = /[^\p{L}\p{N}\s]/gu;
const WHITESPACE_RE = /\s+/g;

/**
 * Canonical comparison key for a display title: lower-cased, punctuation
 * stripped, whitespace collapsed. Blank input yields an empty key.
 */
export const normalizeTitle = (title?: string | null): string => {
  if (!title || title.trim().length === 0) {
    return '';
  }

  return title.toLowerCase().replace(NON_WORD_RE, '').replace(WHITESPACE_RE, ' ').trim();
};

export default normalizeTitle;
