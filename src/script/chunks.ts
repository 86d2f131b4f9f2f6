const SENTENCE_BOUNDARY = /(?<=[.!?])\s+/;

export function normalizeScriptText(text: string): string {
  return text
    .replace(/\\n/g, "\n")
    .replace(/\s+/g, " ")
    .trim();
}

/**
 * Sentences end at `.`, `!` or `?` followed by whitespace or the end of the text.
 * Trailing text without closing punctuation is kept as a final sentence.
 */
export function splitIntoSentences(text: string): string[] {
  const normalized = normalizeScriptText(text);
  if (!normalized) return [];
  return normalized
    .split(SENTENCE_BOUNDARY)
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

/**
 * Greedily packs whole sentences into chunks of at most `wordLimit` words.
 * A sentence longer than the limit is never cut; it becomes its own chunk.
 * `maxChunks` of -1 keeps every chunk, otherwise only the first `maxChunks`.
 */
export function splitTextIntoChunks(
  text: string,
  maxChunks: number,
  wordLimit: number
): string[] {
  const chunks: string[] = [];
  let currentWords: string[] = [];

  for (const sentence of splitIntoSentences(text)) {
    const sentenceWords = sentence.split(" ");
    if (currentWords.length + sentenceWords.length <= wordLimit) {
      currentWords.push(...sentenceWords);
      continue;
    }
    if (currentWords.length > 0) {
      chunks.push(currentWords.join(" "));
    }
    currentWords = sentenceWords;
  }

  if (currentWords.length > 0) {
    chunks.push(currentWords.join(" "));
  }

  if (maxChunks < 0) return chunks;
  return chunks.slice(0, maxChunks);
}
