/**
 * Lazily generate all k-combinations of an array, each exactly once.
 *
 * Walks an index vector in lexicographic order instead of recursing, so the
 * stack depth stays constant whatever the size of `arr` or `k`.
 */
export function* combinations<T>(arr: readonly T[], k: number): Generator<T[], void, undefined> {
  const n = arr.length;
  if (k < 0 || k > n) {
    return;
  }
  if (k === 0) {
    yield [];
    return;
  }

  const indices = Array.from({ length: k }, (_, i) => i);

  while (true) {
    yield indices.map(i => arr[i]);

    // Find rightmost index that can be incremented
    let i = k - 1;
    while (i >= 0 && indices[i] === n - k + i) {
      i--;
    }

    // All combinations generated
    if (i < 0) return;

    // Increment and reset indices to the right
    indices[i]++;
    for (let j = i + 1; j < k; j++) {
      indices[j] = indices[j - 1] + 1;
    }
  }
}

/**
 * Count combinations without generating them (n choose k)
 */
export function countCombinations(n: number, k: number): number {
  if (k > n || k < 0) return 0;
  if (k === 0 || k === n) return 1;

  // Use symmetry to minimize iterations
  if (k > n - k) {
    k = n - k;
  }

  let result = 1;
  for (let i = 0; i < k; i++) {
    result = result * (n - i) / (i + 1);
  }
  return Math.round(result);
}
