export const DEFAULT_CHUNK_SIZE = 500;
export const DEFAULT_CHUNK_OVERLAP = 50;

const codePointLength = (s: string): number => Array.from(s).length;

/**
 * Split a transcript into paragraph-aware chunks of roughly `size` characters.
 *
 * Paragraphs (separated by a blank line) are accumulated greedily. When the
 * next paragraph would push the running buffer past `size`, the buffer is
 * emitted and the next one starts with its trailing `overlap` characters so
 * answers spanning a boundary stay retrievable from either side. A paragraph
 * that alone exceeds `size` is kept whole.
 *
 * Sizes count code points, so an emoji or other astral character is one
 * character and is never split by the overlap carry.
 *
 * @param text Full transcript text.
 * @param size Target maximum characters per chunk.
 * @param overlap Characters carried from the end of one chunk into the next.
 * @returns Ordered chunk strings; empty for blank input.
 */
export function chunkText(
  text: string,
  size = DEFAULT_CHUNK_SIZE,
  overlap = DEFAULT_CHUNK_OVERLAP,
): string[] {
  if (!text || !text.trim()) return [];

  const paragraphs = text
    .split("\n\n")
    .map((p) => p.trim())
    .filter(Boolean);

  const chunks: string[] = [];
  let buffer = "";
  let bufferLength = 0;
  for (const paragraph of paragraphs) {
    const length = codePointLength(paragraph);
    if (buffer && bufferLength + length > size) {
      chunks.push(buffer.trim());
      const carry = overlap > 0 ? Array.from(buffer).slice(-overlap).join("") : "";
      buffer = carry ? `${carry} ${paragraph}` : paragraph;
      bufferLength = carry ? codePointLength(carry) + 1 + length : length;
    } else if (buffer) {
      buffer += `\n\n${paragraph}`;
      bufferLength += 2 + length;
    } else {
      buffer = paragraph;
      bufferLength = length;
    }
  }
  if (buffer) chunks.push(buffer.trim());
  return chunks;
}
