/**
 * Fuzzy string similarity on a 0-100 scale.
 * ratio is the indel similarity (2 * LCS / combined length); partialRatio slides
 * the shorter string across the longer one and keeps the best window.
 */

function lcsLength(a: string, b: string): number {
  if (!a.length || !b.length) return 0;
  let prev = new Array<number>(b.length + 1).fill(0);
  let curr = new Array<number>(b.length + 1).fill(0);
  for (let i = 1; i <= a.length; i++) {
    for (let j = 1; j <= b.length; j++) {
      curr[j] = a[i - 1] === b[j - 1] ? prev[j - 1] + 1 : Math.max(prev[j], curr[j - 1]);
    }
    [prev, curr] = [curr, prev];
    curr.fill(0);
  }
  return prev[b.length];
}

export function ratio(a: string, b: string): number {
  const total = a.length + b.length;
  if (total === 0) return 100;
  return Math.round((200 * lcsLength(a, b)) / total);
}

export function partialRatio(a: string, b: string): number {
  if (!a.length || !b.length) return 0;
  const [shorter, longer] = a.length <= b.length ? [a, b] : [b, a];
  if (longer.includes(shorter)) return 100;

  let best = 0;
  for (let start = 0; start + shorter.length <= longer.length; start++) {
    const score = ratio(shorter, longer.slice(start, start + shorter.length));
    if (score > best) best = score;
    if (best === 100) break;
  }
  return best;
}
