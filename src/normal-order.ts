import { Complex } from './complex';
import { CombiningAlgebra } from './combining-algebra';
import { LogComponent, LogLevel, debug, logTerm } from './debug-logger';
import { AlgebraLimitationError } from './errors';
import { IndexOrder, indexComparator } from './indexed';
import {
  LadderOp,
  LadderOperatorUnit,
  LadderProduct,
  LadderSum,
  isInNormalOrder,
  ladderProduct,
  ladderSum,
  ladderUnit,
  operatorsOf,
} from './ladder';
import { swapTrackingSort } from './swap-tracking-sort';
import { identityProduct, pIsZero, pReduce, renderSum } from './terms';

/** One left-to-right pass folding every unit through `combine`. */
function combinePass(
  algebra: CombiningAlgebra,
  product: LadderProduct
): LadderProduct[] {
  let acc: LadderProduct[] = [identityProduct(ladderUnit, product.coeff)];
  for (const unit of product.units) {
    const next: LadderProduct[] = [];
    for (const term of acc) {
      const produced = algebra.combine(term, unit);
      if (produced.length > 2)
        throw new AlgebraLimitationError(
          `${algebra.name} algebra produced ${produced.length} terms for one insertion`,
          produced.length
        );
      next.push(...produced);
    }
    acc = next;
  }
  return acc;
}

function normalOrderProduct(
  algebra: CombiningAlgebra,
  product: LadderProduct,
  passesLeft: number
): LadderProduct[] | undefined {
  if (isInNormalOrder(product)) return [product];
  if (passesLeft === 0) return undefined;
  const out: LadderProduct[] = [];
  for (const term of combinePass(algebra, product)) {
    const resolved = normalOrderProduct(algebra, term, passesLeft - 1);
    if (resolved === undefined) return undefined;
    out.push(...resolved);
  }
  return out;
}

/**
 * Rewrites a sum so that every product has all creators to the left of all
 * annihilators, expanding same-index swaps into their contraction terms.
 * Returns `undefined` when the algebra cannot resolve a product.
 */
export function constructNormalOrdered(
  algebra: CombiningAlgebra,
  sum: LadderSum
): LadderSum | undefined {
  const products: LadderProduct[] = [];
  for (const raw of sum.terms.values()) {
    const product = pReduce(raw);
    if (pIsZero(product)) continue;
    // each pass moves every misplaced creator at least one place left
    const resolved = normalOrderProduct(
      algebra,
      product,
      product.units.length + 1
    );
    if (resolved === undefined) {
      debug(LogComponent.NORMAL_ORDER, `${algebra.name} algebra could not resolve a product`);
      return undefined;
    }
    products.push(...resolved);
  }
  const result = ladderSum(products);
  logTerm(LogComponent.NORMAL_ORDER, LogLevel.TRACE, 'normal ordered', () =>
    renderSum(ladderUnit, result)
  );
  return result;
}

function sortRun(
  algebra: CombiningAlgebra,
  ops: LadderOp[],
  order: IndexOrder,
  phase: Complex
): { ops: LadderOp[]; phase: Complex } {
  const { sorted, tracking } = swapTrackingSort(
    indexComparator<LadderOperatorUnit>(order),
    (d, acc: Complex) => algebra.track(d, acc),
    phase,
    ops
  );
  return { ops: sorted, phase: tracking };
}

function hasRepeat(ops: LadderOp[]): boolean {
  return ops.some(
    (u, i) => i > 0 && u.index === ops[i - 1].index && u.op === ops[i - 1].op
  );
}

function indexOrderProduct(
  algebra: CombiningAlgebra,
  product: LadderProduct
): LadderProduct | undefined {
  const ops = operatorsOf(product);
  const raises = ops.filter((u) => u.op === LadderOperatorUnit.Raise);
  const lowers = ops.filter((u) => u.op === LadderOperatorUnit.Lower);
  const up = sortRun(algebra, raises, IndexOrder.Ascending, product.coeff);
  const down = sortRun(algebra, lowers, IndexOrder.Descending, up.phase);
  if (algebra.nilpotent && (hasRepeat(up.ops) || hasRepeat(down.ops)))
    return undefined;
  return ladderProduct([...up.ops, ...down.ops], down.phase);
}

/**
 * Normal orders the sum, then sorts creators ascending and annihilators
 * descending by index, folding the exchange phase into each coefficient.
 * Under a nilpotent algebra, products with a repeated operator vanish.
 */
export function constructIndexOrdered(
  algebra: CombiningAlgebra,
  sum: LadderSum
): LadderSum | undefined {
  const normal = constructNormalOrdered(algebra, sum);
  if (normal === undefined) return undefined;
  const products: LadderProduct[] = [];
  for (const product of normal.terms.values()) {
    const ordered = indexOrderProduct(algebra, product);
    if (ordered !== undefined) products.push(ordered);
  }
  const result = ladderSum(products);
  logTerm(LogComponent.NORMAL_ORDER, LogLevel.TRACE, 'index ordered', () =>
    renderSum(ladderUnit, result)
  );
  return result;
}
