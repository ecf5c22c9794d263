/**
 * Header row utilities
 */

/**
 * Makes column names unique by appending `_N` suffixes to repeats
 *
 * The first occurrence of a name is kept as-is; the k-th repeat becomes
 * `name_k`. A generated name never reuses a name that appears literally in
 * the header row or was generated earlier: the counter keeps increasing until
 * a free name is found.
 *
 * @example
 * makeColumnsUnique(['a', 'b', 'a', 'a']) // ['a', 'b', 'a_1', 'a_2']
 * makeColumnsUnique(['a', 'a', 'a_1'])    // ['a', 'a_2', 'a_1']
 */
export function makeColumnsUnique(columns: readonly string[]): string[] {
  // Literal header names are reserved up front so a later 'a_1' keeps its name
  const taken = new Set(columns);
  const seen = new Map<string, number>();
  const unique: string[] = [];

  for (const column of columns) {
    const count = seen.get(column);
    if (count === undefined) {
      seen.set(column, 0);
      unique.push(column);
      continue;
    }

    let next = count + 1;
    while (taken.has(`${column}_${next}`)) {
      next++;
    }
    seen.set(column, next);

    const generated = `${column}_${next}`;
    taken.add(generated);
    unique.push(generated);
  }

  return unique;
}

/**
 * Lists names that appear more than once, in first-seen order
 */
export function findDuplicateColumns(columns: readonly string[]): string[] {
  const counts = new Map<string, number>();
  for (const column of columns) {
    counts.set(column, (counts.get(column) ?? 0) + 1);
  }
  return [...counts].filter(([, count]) => count > 1).map(([column]) => column);
}
