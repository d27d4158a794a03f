/**
 * Yields every k-sized combination of `items` in lexicographic index order,
 * each preserving input order. k > n yields nothing; k = 0 yields `[]` once.
 */
export function* combinations<T>(items: readonly T[], k: number): Generator<T[]> {
  if (k < 0) return;
  if (k === 0) {
    yield [];
    return;
  }

  for (const [i, head] of items.entries()) {
    if (items.length - i < k) return;
    for (const tail of combinations(items.slice(i + 1), k - 1)) yield [head, ...tail];
  }
}

/** All non-empty subsets, smallest first. */
export function* nonEmptySubsets<T>(items: readonly T[]): Generator<T[]> {
  for (let k = 1; k <= items.length; k++) yield* combinations(items, k);
}
