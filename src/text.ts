const CONTROL_CHARS = /[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g;
const WHITESPACE_RUN = /\s+/g;
// A character followed by 30 or more copies of itself
const REPEATED_CHAR = /(.)\1{30,}/gu;

/**
 * Normalize text pulled out of a page: strip control characters, collapse
 * whitespace, trim, and truncate long runs of one character to "xxx...".
 */
export function cleanText(text: string | undefined | null): string {
  if (!text) return '';

  return text
    .replace(CONTROL_CHARS, '')
    .replace(WHITESPACE_RUN, ' ')
    .trim()
    .replace(REPEATED_CHAR, '$1$1$1...');
}

export function titleCase(pageType: string): string {
  return pageType
    .split('_')
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}
