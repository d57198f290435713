import { Complex } from './complex';
import { LadderOp, LadderOperatorUnit, LadderProduct, ladderUnit } from './ladder';
import { C, cTerm, pTerm } from './terms';
import {
  bosonicTracking,
  fermionicTracking,
} from './swap-tracking-sort';

/**
 * Statistics of a ladder-operator algebra, expressed as the rule for
 * inserting one more operator at the right end of a partially normal
 * ordered product.
 */
export interface CombiningAlgebra {
  readonly name: string;
  /** Returns one product, or two when a same-index swap contracts. */
  combine(term: LadderProduct, next: C<LadderOp>): LadderProduct[];
  /** Phase picked up by moving an operator past `displacement` like operators. */
  track(displacement: number, phase: Complex): Complex;
  /** Whether a repeated operator annihilates the product (Pauli exclusion). */
  readonly nilpotent: boolean;
}

/** Operators of `term` with their coefficients moved onto the product. */
function withoutIdentity(term: LadderProduct): C<LadderOp>[] {
  return term.units
    .filter((u) => u.item.op !== LadderOperatorUnit.Identity)
    .map((u) => cTerm(u.item));
}

function padded(units: C<LadderOp>[]): C<LadderOp>[] {
  return units.length > 0 ? units : [{ coeff: Complex.ONE, item: ladderUnit.identity }];
}

/**
 * Builds an algebra in which `a_k a†_j = sign · a†_j a_k + δ_jk`.
 * The sign is -1 for fermions (CAR) and +1 for bosons (CCR).
 */
function exchangeAlgebra(
  name: string,
  sign: Complex,
  track: (displacement: number, phase: Complex) => Complex,
  nilpotent: boolean
): CombiningAlgebra {
  return {
    name,
    track,
    nilpotent,
    combine(term, next) {
      const units = withoutIdentity(term);
      const coeff = term.units
        .reduce((acc, u) => acc.mul(u.coeff), term.coeff)
        .mul(next.coeff);
      if (next.item.op === LadderOperatorUnit.Identity) return [pTerm(padded(units), coeff)];
      const incoming = cTerm(next.item);
      const last = units[units.length - 1];
      if (
        last === undefined ||
        last.item.op !== LadderOperatorUnit.Lower ||
        next.item.op !== LadderOperatorUnit.Raise
      ) {
        return [pTerm([...units, incoming], coeff)];
      }
      const prefix = units.slice(0, -1);
      const swapped = pTerm([...prefix, incoming, last], coeff.mul(sign));
      if (last.item.index !== next.item.index) return [swapped];
      return [pTerm(padded(prefix), coeff), swapped];
    },
  };
}

export const fermionicAlgebra: CombiningAlgebra = exchangeAlgebra(
  'fermionic',
  Complex.MINUS_ONE,
  fermionicTracking,
  true
);

export const bosonicAlgebra: CombiningAlgebra = exchangeAlgebra(
  'bosonic',
  Complex.ONE,
  bosonicTracking,
  false
);
