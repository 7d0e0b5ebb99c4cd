/**
 * Splits `text` on whitespace into pieces of at most `maxLength` code points,
 * cutting single words that are longer than that.
 */
export function splitForSpeech(text: string, maxLength = 100): string[] {
  const words = text.trim().split(/\s+/).filter((word) => word.length > 0);
  const segments: string[] = [];
  let current: string[] = [];

  for (const word of words) {
    const chars = Array.from(word);
    if (!current.length) {
      current = chars;
    } else if (current.length + 1 + chars.length <= maxLength) {
      current.push(" ", ...chars);
      continue;
    } else {
      segments.push(current.join(""));
      current = chars;
    }

    while (current.length > maxLength) {
      segments.push(current.slice(0, maxLength).join(""));
      current = current.slice(maxLength);
    }
  }

  if (current.length) segments.push(current.join(""));
  return segments;
}
