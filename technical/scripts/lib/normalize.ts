const NON_ALNUM_SPACE_PATTERN = /[^a-z0-9\s]/g;
const WHITESPACE_RUN_PATTERN = /\s+/g;

/**
 * Canonical form used for every master-data key: lower-case ASCII letters and
 * digits separated by single spaces. Total and idempotent.
 */
export function normalize(text: string | null | undefined): string {
  if (!text) {
    return '';
  }

  return text
    .toLowerCase()
    .trim()
    .replace(NON_ALNUM_SPACE_PATTERN, ' ')
    .replace(WHITESPACE_RUN_PATTERN, ' ')
    .trim();
}

export function tokenize(text: string): string[] {
  const normalized = normalize(text);
  return normalized ? normalized.split(' ') : [];
}
