/**
 * Length of the longest common subsequence of two code point arrays
 */
function lcsLength(a: string[], b: string[]): number {
  if (a.length === 0 || b.length === 0) return 0;

  // Keep the shorter string on the inner loop
  const [outer, inner] = a.length >= b.length ? [a, b] : [b, a];
  let previous = new Array<number>(inner.length + 1).fill(0);
  let current = new Array<number>(inner.length + 1).fill(0);

  for (const char of outer) {
    for (let j = 1; j <= inner.length; j++) {
      current[j] = char === inner[j - 1]
        ? previous[j - 1] + 1
        : Math.max(previous[j], current[j - 1]);
    }
    [previous, current] = [current, previous];
  }

  return previous[inner.length];
}

/**
 * Indel similarity ratio between two strings, 0 to 100
 * 100 means identical; two empty strings are identical
 */
export function similarityRatio(a: string, b: string): number {
  const charsA = Array.from(a);
  const charsB = Array.from(b);
  const total = charsA.length + charsB.length;
  if (total === 0) return 100;
  return (2 * lcsLength(charsA, charsB) * 100) / total;
}

/**
 * Whether two strings of these lengths can reach the threshold at all
 * The ratio is bounded by 2·min/(la+lb), so the length gap must stay within (1 - t/100)(la+lb)
 */
export function lengthsCanMatch(lengthA: number, lengthB: number, threshold: number): boolean {
  const total = lengthA + lengthB;
  if (total === 0) return true;
  return Math.abs(lengthA - lengthB) <= (1 - threshold / 100) * total + 1e-9;
}
