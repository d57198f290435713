import { Complex } from './complex';
import { CombiningAlgebra, bosonicAlgebra, fermionicAlgebra } from './combining-algebra';
import { LogComponent, LogLevel, debug, logTerm } from './debug-logger';
import { IxOp, ixOp } from './indexed';
import {
  LadderOp,
  LadderOperatorUnit,
  isInNormalOrder,
  ladderProduct,
  ladderSum,
  operatorsOf,
} from './ladder';
import { constructNormalOrdered } from './normal-order';
import { P, S, TermUnit, pIsZero, pOf, pReduce, productTerms, renderSum, sTerm } from './terms';

/**
 * Systems with both fermionic and bosonic modes. Operators carry their
 * sector; operators of different sectors commute.
 */
export enum ParticleSector {
  Fermionic = 'f',
  Bosonic = 'b',
}

export interface SectorOperator {
  readonly sector: ParticleSector;
  readonly op: LadderOperatorUnit;
}

export type MixedOp = IxOp<SectorOperator>;
export type MixedProduct = P<MixedOp>;
export type MixedSum = S<MixedOp>;

export const mixedUnit: TermUnit<MixedOp> = {
  identity: {
    index: 0,
    op: { sector: ParticleSector.Fermionic, op: LadderOperatorUnit.Identity },
  },
  key: (u) => `${u.op.sector}${u.op.op}${u.index}`,
  render: (u) => `(${u.op.sector}:${u.op.op}, ${u.index})`,
};

export const fermion = (op: LadderOperatorUnit, j: number): MixedOp =>
  ixOp(j, { sector: ParticleSector.Fermionic, op });

export const boson = (op: LadderOperatorUnit, j: number): MixedOp =>
  ixOp(j, { sector: ParticleSector.Bosonic, op });

export function mixedProduct(
  ops: readonly MixedOp[],
  coeff: Complex = Complex.ONE
): MixedProduct {
  return pOf(ops.length > 0 ? ops : [mixedUnit.identity], coeff);
}

export function mixedSum(
  products: Iterable<MixedProduct>,
  coeff: Complex = Complex.ONE
): MixedSum {
  return sTerm(mixedUnit, products, coeff);
}

const isIdentity = (u: MixedOp) => u.op.op === LadderOperatorUnit.Identity;

function inSector(p: MixedProduct, sector: ParticleSector): MixedOp[] {
  return p.units
    .map((u) => u.item)
    .filter((u) => !isIdentity(u) && u.op.sector === sector);
}

function untag(ops: readonly MixedOp[]): LadderOp[] {
  return ops.map((u) => ixOp(u.index, u.op.op));
}

function tag(sector: ParticleSector, ops: readonly LadderOp[]): MixedOp[] {
  return ops.map((u) => ixOp(u.index, { sector, op: u.op }));
}

/** No bosonic operator precedes a fermionic one. Identity units are ignored. */
export function isSectorBlockOrdered(p: MixedProduct): boolean {
  let seenBoson = false;
  for (const { item } of p.units) {
    if (isIdentity(item)) continue;
    if (item.op.sector === ParticleSector.Bosonic) seenBoson = true;
    else if (seenBoson) return false;
  }
  return true;
}

/** Sector block ordered, with each block in normal order. */
export function isMixedNormalOrdered(p: MixedProduct): boolean {
  return (
    isSectorBlockOrdered(p) &&
    isInNormalOrder(ladderProduct(untag(inSector(p, ParticleSector.Fermionic)))) &&
    isInNormalOrder(ladderProduct(untag(inSector(p, ParticleSector.Bosonic))))
  );
}

/**
 * Moves every fermionic operator in front of every bosonic one, keeping the
 * order within each sector. The coefficient does not change.
 */
export function toSectorBlockOrder(p: MixedProduct): MixedProduct {
  const reduced = pReduce(p);
  if (pIsZero(reduced)) return reduced;
  return mixedProduct(
    [
      ...inSector(reduced, ParticleSector.Fermionic),
      ...inSector(reduced, ParticleSector.Bosonic),
    ],
    reduced.coeff
  );
}

interface SectorTerm {
  readonly coeff: Complex;
  readonly ops: LadderOp[];
}

function normalOrderSector(
  algebra: CombiningAlgebra,
  ops: LadderOp[]
): SectorTerm[] | undefined {
  if (ops.length === 0) return [{ coeff: Complex.ONE, ops: [] }];
  const ordered = constructNormalOrdered(algebra, ladderSum([ladderProduct(ops)]));
  if (ordered === undefined) return undefined;
  return productTerms(ordered).map((p) => ({ coeff: p.coeff, ops: operatorsOf(p) }));
}

/**
 * Block orders every product, then normal orders the fermionic block with
 * anticommutation and the bosonic block with commutation. Returns
 * `undefined` when either block cannot be ordered.
 */
export function constructMixedNormalOrdered(sum: MixedSum): MixedSum | undefined {
  const products: MixedProduct[] = [];
  for (const raw of sum.terms.values()) {
    const blocked = toSectorBlockOrder(raw);
    if (pIsZero(blocked)) continue;
    const fermions = normalOrderSector(
      fermionicAlgebra,
      untag(inSector(blocked, ParticleSector.Fermionic))
    );
    const bosons = normalOrderSector(
      bosonicAlgebra,
      untag(inSector(blocked, ParticleSector.Bosonic))
    );
    if (fermions === undefined || bosons === undefined) {
      debug(LogComponent.NORMAL_ORDER, 'could not normal order a mixed product');
      return undefined;
    }
    for (const f of fermions) {
      for (const b of bosons) {
        products.push(
          mixedProduct(
            [...tag(ParticleSector.Fermionic, f.ops), ...tag(ParticleSector.Bosonic, b.ops)],
            blocked.coeff.mul(f.coeff).mul(b.coeff)
          )
        );
      }
    }
  }
  const result = mixedSum(products);
  logTerm(LogComponent.NORMAL_ORDER, LogLevel.TRACE, 'mixed normal ordered', () =>
    renderSum(mixedUnit, result)
  );
  return result;
}
