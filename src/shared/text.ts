/** Length in code points; an astral character such as an emoji counts once. */
export function charLength(text: string): number {
  return Array.from(text).length;
}

/** First `max` code points of `text`; never splits a surrogate pair. */
export function truncateChars(text: string, max: number): string {
  if (text.length <= max) return text;
  return Array.from(text).slice(0, max).join('');
}
