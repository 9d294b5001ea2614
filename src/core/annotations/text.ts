/**
 * Drop lines that contain only whitespace. Doc comments indent their text
 * and leave blank lines around it.
 */
export function removeBlankLines(text: string): string {
  return text
    .split(/\r?\n/)
    .filter((line) => line.trim().length > 0)
    .join("\n");
}

/**
 * Trimmed text with blank lines removed, or undefined when nothing is left
 */
export function cleanText(text: string): string | undefined {
  const cleaned = removeBlankLines(text.trim());
  return cleaned.length > 0 ? cleaned : undefined;
}
