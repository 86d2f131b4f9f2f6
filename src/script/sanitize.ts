const TYPOGRAPHIC_REPLACEMENTS: Array<[RegExp, string]> = [
  [/[\u2018\u2019]/g, "'"],
  [/[\u201C\u201D]/g, '"'],
  [/[\u2013\u2014]/g, "-"],
  [/\u2026/g, "..."],
  [/\u00A0/g, " "],
];

/**
 * Flattens generated text so it can be embedded in a quoted filter/script argument:
 * typographic punctuation becomes ASCII, backslashes and double quotes are escaped,
 * every newline becomes the two-character `\n` token and tabs become spaces.
 */
export function sanitizeForScript(text: string): string {
  let out = text;
  for (const [pattern, replacement] of TYPOGRAPHIC_REPLACEMENTS) {
    out = out.replace(pattern, replacement);
  }
  return out
    .replace(/\\/g, "\\\\")
    .replace(/"/g, '\\"')
    .replace(/\r\n|\r|\n/g, "\\n")
    .replace(/\t/g, " ")
    .trim();
}

export function unescapeScript(text: string): string {
  return text.replace(/\\(n|"|\\)/g, (_, ch: string) => (ch === "n" ? "\n" : ch));
}

/** First non-empty paragraph of a sanitized script, as plain text. */
export function getFirstParagraph(sanitized: string): string {
  const paragraphs = unescapeScript(sanitized)
    .split(/\n\s*\n/)
    .map((p) => p.trim())
    .filter((p) => p.length > 0);
  return paragraphs[0] ?? "";
}
