/**
 * Text folding and similarity helpers used to compare titles and artist names.
 */

/**
 * Folds a string for comparison: lower-case, diacritics removed, every run
 * of non-alphanumeric characters replaced by a single space.
 */
export function foldText(value: string): string {
  return value
    .normalize('NFKD')
    .replace(/[\u0300-\u036f]/g, '')
    .toLowerCase()
    .replace(/[^\p{L}\p{N}]+/gu, ' ')
    .trim();
}

function bigrams(value: string): Map<string, number> {
  const counts = new Map<string, number>();
  for (let i = 0; i < value.length - 1; i++) {
    const pair = value.slice(i, i + 2);
    counts.set(pair, (counts.get(pair) ?? 0) + 1);
  }
  return counts;
}

/**
 * Sørensen–Dice coefficient over character bigrams of the folded strings
 * (spaces ignored). Returns a value in [0, 1]; equal folded strings score 1.
 */
export function diceCoefficient(a: string, b: string): number {
  const left = foldText(a).replace(/ /g, '');
  const right = foldText(b).replace(/ /g, '');

  if (left === right) return left.length > 0 ? 1 : 0;
  if (left.length < 2 || right.length < 2) return 0;

  const leftPairs = bigrams(left);
  const rightPairs = bigrams(right);

  let overlap = 0;
  for (const [pair, count] of leftPairs) {
    const other = rightPairs.get(pair);
    if (other !== undefined) {
      overlap += Math.min(count, other);
    }
  }

  return (2 * overlap) / (left.length - 1 + (right.length - 1));
}
