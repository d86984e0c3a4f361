// ============================================================================
// bluefind — Fuzzy Name Scoring
// Scores are in [0, 1]; 1 is a perfect match
// ============================================================================

export function levenshtein(a: string, b: string): number {
  if (a === b) return 0;
  if (!a.length) return b.length;
  if (!b.length) return a.length;

  let prev = Array.from({ length: b.length + 1 }, (_, i) => i);
  for (let i = 1; i <= a.length; i++) {
    const row = [i];
    for (let j = 1; j <= b.length; j++) {
      const cost = a[i - 1] === b[j - 1] ? 0 : 1;
      row[j] = Math.min(prev[j] + 1, row[j - 1] + 1, prev[j - 1] + cost);
    }
    prev = row;
  }
  return prev[b.length];
}

/**
 * query.length divided by the shortest window of `target` that holds every
 * query character in order; 0 when the query is not a subsequence.
 */
export function subsequenceScore(query: string, target: string): number {
  if (!query.length) return 0;
  let best = Infinity;

  for (let start = target.indexOf(query[0]); start !== -1; start = target.indexOf(query[0], start + 1)) {
    let qi = 1;
    let end = start;
    for (let ti = start + 1; ti < target.length && qi < query.length; ti++) {
      if (target[ti] === query[qi]) {
        qi++;
        end = ti;
      }
    }
    if (qi < query.length) break; // later starts can only see fewer characters
    best = Math.min(best, end - start + 1);
  }

  return best === Infinity ? 0 : query.length / best;
}

export function tokenize(name: string): string[] {
  return name.split(/[^a-z0-9]+/).filter(Boolean);
}

function editScore(query: string, target: string): number {
  const longest = Math.max(query.length, target.length);
  return longest === 0 ? 0 : 1 - levenshtein(query, target) / longest;
}

/** Best of subsequence and edit-distance similarity, against the whole name and each of its words. */
export function similarity(query: string, name: string): number {
  const q = query.toLowerCase();
  const n = name.toLowerCase();
  if (!q) return 0;

  let best = subsequenceScore(q, n);
  for (const candidate of [n, ...tokenize(n)]) {
    best = Math.max(best, editScore(q, candidate));
  }
  return best;
}
