export const DEFAULT_CHUNK_CHARS = 1200;

/**
 * Paragraph-aware chunking. Paragraphs are packed until the next one would
 * overflow `maxChars`; a single oversized paragraph is split on sentence
 * boundaries, then hard-cut as a last resort.
 */
export function chunkPolicyText(text: string, maxChars = DEFAULT_CHUNK_CHARS): string[] {
  const paragraphs = text
    .replace(/\r\n/g, "\n")
    .split(/\n\s*\n/)
    .map((p) => p.replace(/\s+/g, " ").trim())
    .filter(Boolean);

  const pieces: string[] = [];
  for (const paragraph of paragraphs) {
    if (paragraph.length <= maxChars) {
      pieces.push(paragraph);
      continue;
    }
    let current = "";
    for (const sentence of splitSentences(paragraph)) {
      if (sentence.length > maxChars) {
        if (current) {
          pieces.push(current);
          current = "";
        }
        for (let i = 0; i < sentence.length; i += maxChars) {
          pieces.push(sentence.slice(i, i + maxChars));
        }
        continue;
      }
      const candidate = current ? `${current} ${sentence}` : sentence;
      if (candidate.length > maxChars) {
        pieces.push(current);
        current = sentence;
      } else {
        current = candidate;
      }
    }
    if (current) pieces.push(current);
  }

  const chunks: string[] = [];
  let current = "";
  for (const piece of pieces) {
    const candidate = current ? `${current}\n\n${piece}` : piece;
    if (candidate.length > maxChars && current) {
      chunks.push(current);
      current = piece;
    } else {
      current = candidate;
    }
  }
  if (current) chunks.push(current);

  return chunks;
}

export function splitSentences(text: string): string[] {
  return (text.match(/[^.!?]+(?:[.!?]+|$)/g) ?? [])
    .map((s) => s.trim())
    .filter(Boolean);
}
