import { Complex } from './complex';
import { LogComponent, LogLevel, logTerm } from './debug-logger';

/**
 * What the term algebra needs to know about a unit type: its multiplicative
 * identity, a structural key used to recognise like terms, and a renderer.
 */
export interface TermUnit<U> {
  readonly identity: U;
  key(unit: U): string;
  render(unit: U): string;
}

/** A scalar times one unit. */
export interface C<U> {
  readonly coeff: Complex;
  readonly item: U;
}

/** An ordered product of units with one overall coefficient. */
export interface P<U> {
  readonly coeff: Complex;
  readonly units: readonly C<U>[];
}

/**
 * A canonical sum of products keyed by operator content. A sum's own
 * coefficient is distributed over its products when it is built, so every
 * coefficient lives on a product.
 */
export interface S<U> {
  readonly terms: ReadonlyMap<string, P<U>>;
}

export function cTerm<U>(item: U, coeff: Complex = Complex.ONE): C<U> {
  return { coeff: coeff.reduce(), item };
}

export function pTerm<U>(
  units: readonly C<U>[],
  coeff: Complex = Complex.ONE
): P<U> {
  return { coeff: coeff.reduce(), units };
}

export function pOf<U>(items: readonly U[], coeff: Complex = Complex.ONE): P<U> {
  return pTerm(
    items.map((u) => cTerm(u)),
    coeff
  );
}

export function zeroProduct<U>(): P<U> {
  return { coeff: Complex.ZERO, units: [] };
}

export function identityProduct<U>(
  alg: TermUnit<U>,
  coeff: Complex = Complex.ONE
): P<U> {
  return pOf([alg.identity], coeff);
}

/**
 * A product vanishes when its coefficient or any unit coefficient is zero.
 * The empty product carries no operator at all and counts as zero too.
 */
export function pIsZero<U>(p: P<U>): boolean {
  return (
    p.units.length === 0 ||
    p.coeff.isZero() ||
    p.units.some((u) => u.coeff.isZero())
  );
}

/** Moves every unit coefficient onto the product. */
export function pReduce<U>(p: P<U>): P<U> {
  if (pIsZero(p)) return zeroProduct();
  const coeff = p.units.reduce((acc, u) => acc.mul(u.coeff), p.coeff);
  return pTerm(
    p.units.map((u) => cTerm(u.item)),
    coeff
  );
}

/** Tensor product: concatenation, not commutative. */
export function pMul<U>(a: P<U>, b: P<U>): P<U> {
  return pTerm([...a.units, ...b.units], a.coeff.mul(b.coeff));
}

export function pScale<U>(p: P<U>, k: Complex): P<U> {
  return pTerm(p.units, p.coeff.mul(k));
}

export function pKey<U>(alg: TermUnit<U>, p: P<U>): string {
  return p.units.map((u) => alg.key(u.item)).join('|');
}

export function renderProduct<U>(alg: TermUnit<U>, p: P<U>): string {
  return `${p.coeff} [${p.units.map((u) => alg.render(u.item)).join(' | ')}]`;
}

/**
 * Builds a canonical sum: products are reduced, like products are merged by
 * adding coefficients, and entries whose combined coefficient is exactly zero
 * are dropped.
 */
export function sTerm<U>(
  alg: TermUnit<U>,
  products: Iterable<P<U>>,
  coeff: Complex = Complex.ONE
): S<U> {
  const terms = new Map<string, P<U>>();
  let seen = 0;
  for (const raw of products) {
    seen++;
    const p = pReduce(pScale(raw, coeff));
    if (pIsZero(p)) continue;
    const key = pKey(alg, p);
    const existing = terms.get(key);
    terms.set(
      key,
      existing ? pTerm(existing.units, existing.coeff.add(p.coeff)) : p
    );
  }
  for (const [key, p] of terms) {
    if (p.coeff.isZero()) terms.delete(key);
  }
  logTerm(
    LogComponent.TERMS,
    LogLevel.TRACE,
    `combined ${seen} products into ${terms.size} terms`
  );
  return { terms };
}

export function zeroSum<U>(): S<U> {
  return { terms: new Map() };
}

/** Products of a sum ordered by canonical key. */
export function productTerms<U>(s: S<U>): P<U>[] {
  return [...s.terms.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([, p]) => p);
}

export function sIsZero<U>(s: S<U>): boolean {
  return s.terms.size === 0;
}

export function sAdd<U>(alg: TermUnit<U>, a: S<U>, b: S<U>): S<U> {
  return sTerm(alg, [...a.terms.values(), ...b.terms.values()]);
}

export function sMul<U>(alg: TermUnit<U>, a: S<U>, b: S<U>): S<U> {
  const products: P<U>[] = [];
  for (const l of a.terms.values()) {
    for (const r of b.terms.values()) products.push(pMul(l, r));
  }
  return sTerm(alg, products);
}

export function sScale<U>(alg: TermUnit<U>, s: S<U>, k: Complex): S<U> {
  return sTerm(alg, s.terms.values(), k);
}

export function renderSum<U>(alg: TermUnit<U>, s: S<U>): string {
  return `{${productTerms(s)
    .map((p) => renderProduct(alg, p))
    .join('; ')}}`;
}
