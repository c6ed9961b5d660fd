/**
 * Splits `text` into pieces of roughly `size` characters, preferring to break
 * after a space. Joining the pieces gives back `text` exactly.
 */
export function chunkText(text: string, size = 48): string[] {
  if (size < 1) throw new RangeError("Chunk size must be at least 1");
  const chunks: string[] = [];
  let cursor = 0;

  while (cursor < text.length) {
    let end = Math.min(cursor + size, text.length);
    if (end < text.length) {
      const breakpoint = text.lastIndexOf(" ", end - 1);
      if (breakpoint > cursor + Math.floor(size / 2)) {
        end = breakpoint + 1;
      }
    }
    chunks.push(text.slice(cursor, end));
    cursor = end;
  }

  return chunks;
}
