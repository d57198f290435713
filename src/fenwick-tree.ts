/**
 * Functional binary indexed tree over an associative `combine` with
 * identity. Storage is 1-indexed (`data[0]` holds the identity); the public
 * operations take 0-based positions.
 */
export interface FenwickTree<A> {
  readonly data: readonly A[];
  readonly combine: (a: A, b: A) => A;
  readonly identity: A;
}

export const lsb = (k: number): number => k & -k;

/** 1-based ancestors of `k` up to and including `n`, nearest first. */
export function ancestors(n: number, k: number): number[] {
  const out: number[] = [];
  for (let i = k + lsb(k); i <= n; i += lsb(i)) out.push(i);
  return out;
}

/** 1-based nodes whose aggregates feed node `k`, largest first. */
export function descendants(k: number): number[] {
  const wall = k - lsb(k);
  const out: number[] = [];
  for (let i = k - 1; i > wall; i &= i - 1) out.push(i);
  return out;
}

/** 1-based nodes a prefix query over the first `k` positions visits. */
export function prefixIndices(k: number): number[] {
  const out: number[] = [];
  for (let i = k; i > 0; i &= i - 1) out.push(i);
  return out;
}

export function build<A>(
  combine: (a: A, b: A) => A,
  identity: A,
  n: number,
  f: (i: number) => A
): FenwickTree<A> {
  const data: A[] = [identity];
  for (let i = 0; i < n; i++) data.push(f(i));
  for (let i = 1; i <= n; i++) {
    const p = i + lsb(i);
    if (p <= n) data[p] = combine(data[p], data[i]);
  }
  return { data, combine, identity };
}

export function ofArray<A>(
  combine: (a: A, b: A) => A,
  identity: A,
  values: readonly A[]
): FenwickTree<A> {
  return build(combine, identity, values.length, (i) => values[i]);
}

export function empty<A>(
  combine: (a: A, b: A) => A,
  identity: A,
  n: number
): FenwickTree<A> {
  return build(combine, identity, n, () => identity);
}

export function size<A>(tree: FenwickTree<A>): number {
  return tree.data.length - 1;
}

/** Combination of positions `0..j` inclusive. */
export function prefixQuery<A>(tree: FenwickTree<A>, j: number): A {
  return prefixIndices(j + 1).reduce(
    (acc, i) => tree.combine(acc, tree.data[i]),
    tree.identity
  );
}

/**
 * Folds node `j + 1` with the nodes feeding it. Under a self-inverse
 * combine such as XOR this recovers the value stored at `j`.
 */
export function pointQuery<A>(tree: FenwickTree<A>, j: number): A {
  const k = j + 1;
  return descendants(k).reduce((acc, i) => tree.combine(acc, tree.data[i]), tree.data[k]);
}

/** Combines `delta` into position `j`, returning a new tree. */
export function update<A>(tree: FenwickTree<A>, j: number, delta: A): FenwickTree<A> {
  const data = [...tree.data];
  const k = j + 1;
  data[k] = tree.combine(data[k], delta);
  for (const a of ancestors(size(tree), k)) data[a] = tree.combine(data[a], delta);
  return { ...tree, data };
}

// Bravyi-Kitaev index sets, 0-based.

export function updateSet(j: number, n: number): Set<number> {
  return new Set(ancestors(n, j + 1).map((i) => i - 1));
}

export function paritySet(j: number): Set<number> {
  return new Set(prefixIndices(j).map((i) => i - 1));
}

export function occupationSet(j: number): Set<number> {
  return new Set([j, ...descendants(j + 1).map((i) => i - 1)]);
}

export function remainderSet(j: number): Set<number> {
  const occupation = occupationSet(j);
  return new Set([...paritySet(j)].filter((i) => !occupation.has(i)));
}

export function symmetricDifference<T>(a: ReadonlySet<T>, b: ReadonlySet<T>): Set<T> {
  return new Set([...[...a].filter((x) => !b.has(x)), ...[...b].filter((x) => !a.has(x))]);
}
