// Stays under the 8,191-token input limit for prose (~4 chars/token) with headroom for non-Latin text
export const MAX_EMBED_CHARS = 8000;

/**
 * Clip text to what the embedding model accepts.
 * Prefers a paragraph break, then a sentence end, then any whitespace, in the last quarter of the window.
 */
export function truncateToSafeLength(text: string, maxChars = MAX_EMBED_CHARS): string {
  if (text.length <= maxChars) return text;

  const window = text.slice(0, maxChars);
  const floor = Math.floor(maxChars * 0.75);

  const paragraph = window.lastIndexOf('\n\n');
  if (paragraph >= floor) return window.slice(0, paragraph);

  const sentence = Math.max(window.lastIndexOf('. '), window.lastIndexOf('.\n'));
  if (sentence >= floor) return window.slice(0, sentence + 1);

  const space = window.search(/\s\S*$/);
  if (space >= floor) return window.slice(0, space);

  return window;
}
