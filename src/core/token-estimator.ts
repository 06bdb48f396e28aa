const CHARS_PER_TOKEN = 4;

/**
 * Rough token count for English-ish text and source code.
 */
export function estimateTokens(text: string): number {
  if (!text) return 0;
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}
