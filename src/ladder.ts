import { Complex } from './complex';
import { IndexOrder, IxOp, indicesInOrder, ixOp } from './indexed';
import { P, S, TermUnit, pOf, sTerm } from './terms';

export enum LadderOperatorUnit {
  Identity = 'I',
  Raise = 'u',
  Lower = 'd',
}

export type LadderOp = IxOp<LadderOperatorUnit>;
export type LadderProduct = P<LadderOp>;
export type LadderSum = S<LadderOp>;

export const ladderUnit: TermUnit<LadderOp> = {
  identity: { index: 0, op: LadderOperatorUnit.Identity },
  key: (u) => `${u.op}${u.index}`,
  render: (u) => `(${u.op}, ${u.index})`,
};

export const raise = (j: number): LadderOp => ixOp(j, LadderOperatorUnit.Raise);
export const lower = (j: number): LadderOp => ixOp(j, LadderOperatorUnit.Lower);

export function isIdentity(u: LadderOp): boolean {
  return u.op === LadderOperatorUnit.Identity;
}

export function ladderProduct(
  ops: readonly LadderOp[],
  coeff: Complex = Complex.ONE
): LadderProduct {
  return pOf(ops.length > 0 ? ops : [ladderUnit.identity], coeff);
}

export function ladderSum(
  products: Iterable<LadderProduct>,
  coeff: Complex = Complex.ONE
): LadderSum {
  return sTerm(ladderUnit, products, coeff);
}

/** Operators of a product with Identity padding removed. */
export function operatorsOf(p: LadderProduct): LadderOp[] {
  return p.units.map((u) => u.item).filter((u) => !isIdentity(u));
}

/** No annihilator is followed, anywhere to its right, by a creator. */
export function isInNormalOrder(p: LadderProduct): boolean {
  let seenLower = false;
  for (const u of operatorsOf(p)) {
    if (u.op === LadderOperatorUnit.Lower) seenLower = true;
    else if (u.op === LadderOperatorUnit.Raise && seenLower) return false;
  }
  return true;
}

/**
 * Normal ordered, with creators in ascending and annihilators in descending
 * index order.
 */
export function isInIndexOrder(p: LadderProduct): boolean {
  if (!isInNormalOrder(p)) return false;
  const ops = operatorsOf(p);
  return (
    indicesInOrder(
      IndexOrder.Ascending,
      ops.filter((u) => u.op === LadderOperatorUnit.Raise)
    ) &&
    indicesInOrder(
      IndexOrder.Descending,
      ops.filter((u) => u.op === LadderOperatorUnit.Lower)
    )
  );
}

export function sumIsInNormalOrder(s: LadderSum): boolean {
  return [...s.terms.values()].every(isInNormalOrder);
}

export function sumIsInIndexOrder(s: LadderSum): boolean {
  return [...s.terms.values()].every(isInIndexOrder);
}
