/**
 * Text clean-up for extracted PDF text and model replies
 */

/**
 * Remove characters Postgres text columns reject or that break line
 * classification. Line breaks are kept; tabs become spaces.
 */
export function sanitizeText(text: string): string {
  return text
    .replace(/[\x00-\x08\x0B\x0C\x0E-\x1F\x7F]/g, '')
    .replace(/[\uD800-\uDFFF]/g, '\uFFFD')
    .replace(/[\uFEFF\uFFFE]/g, '')
    .replace(/\u00A0/g, ' ')
    .normalize('NFC')
    .replace(/[ \t]+/g, ' ')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Strip every ASCII control character, newlines included. Model replies are
 * passed through this before JSON parsing.
 */
export function stripControlCharacters(text: string): string {
  return text.replace(/[\x00-\x1F\x7F]/g, '');
}
