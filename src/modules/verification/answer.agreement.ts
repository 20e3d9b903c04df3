function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .replace(/\[\d+\]/g, " ")
    .split(/[^\p{L}\p{N}]+/u)
    .filter((token) => token.length > 0);
}

/**
 * Dice coefficient over the distinct word tokens of two answers.
 * Citation markers are ignored. Either answer empty gives 0.
 */
export function answerAgreement(first: string, second: string): number {
  const a = new Set(tokenize(first));
  const b = new Set(tokenize(second));
  if (a.size === 0 || b.size === 0) return 0;

  let shared = 0;
  for (const token of a) {
    if (b.has(token)) shared++;
  }

  return (2 * shared) / (a.size + b.size);
}
