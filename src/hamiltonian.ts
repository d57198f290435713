import { Complex } from './complex';
import { LogComponent, debug } from './debug-logger';
import { LadderOperatorUnit, LadderProduct, LadderSum, operatorsOf } from './ladder';
import { jordanWignerTerms } from './majorana-encoding';
import { PauliRegister, PauliRegisterSequence } from './pauli-register';
import { pIsZero, pReduce } from './terms';

/** Encodes one ladder operator on mode `j` of an `n`-qubit register. */
export type EncoderFn = (op: LadderOperatorUnit, j: number, n: number) => PauliRegisterSequence;

/**
 * Integral lookup keyed by concatenated indices, `"ij"` for one-body and
 * `"ijkl"` for two-body terms. `undefined` means the term is absent.
 */
export type CoefficientFactory = (key: string) => Complex | undefined;

export interface HamiltonianOptions {
  /** Prune terms with coefficient magnitude at or below this value. */
  tolerance?: number;
}

const HALF = Complex.real(0.5);

function encodeChain(
  encode: EncoderFn,
  ops: readonly (readonly [LadderOperatorUnit, number])[],
  n: number,
  coeff: Complex
): PauliRegisterSequence {
  return ops.reduce(
    (acc, [op, j]) => acc.mul(encode(op, j, n)),
    PauliRegisterSequence.of(PauliRegister.identity(n, coeff))
  );
}

/** Encodes a product of ladder operators, Identity units contributing nothing. */
export function encodeProductTerm(
  encode: EncoderFn,
  product: LadderProduct,
  n: number
): PauliRegisterSequence {
  const reduced = pReduce(product);
  if (pIsZero(reduced)) return PauliRegisterSequence.EMPTY;
  const ops = operatorsOf(reduced).map((u) => [u.op, u.index] as const);
  return encodeChain(encode, ops, n, reduced.coeff);
}

export function encodeSum(encode: EncoderFn, sum: LadderSum, n: number): PauliRegisterSequence {
  return PauliRegisterSequence.sum([...sum.terms.values()].map((p) => encodeProductTerm(encode, p, n)));
}

/** `Σ h_ij a†_i a_j` */
function oneBodyTerms(encode: EncoderFn, factory: CoefficientFactory, n: number): PauliRegisterSequence[] {
  const out: PauliRegisterSequence[] = [];
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      const h = factory(`${i}${j}`);
      if (h === undefined) continue;
      out.push(
        encodeChain(
          encode,
          [
            [LadderOperatorUnit.Raise, i],
            [LadderOperatorUnit.Lower, j],
          ],
          n,
          h
        )
      );
    }
  }
  return out;
}

/** `½ Σ h_ijkl a†_i a†_j a_k a_l` */
function twoBodyTerms(encode: EncoderFn, factory: CoefficientFactory, n: number): PauliRegisterSequence[] {
  const out: PauliRegisterSequence[] = [];
  for (let i = 0; i < n; i++) {
    for (let j = 0; j < n; j++) {
      for (let k = 0; k < n; k++) {
        for (let l = 0; l < n; l++) {
          const h = factory(`${i}${j}${k}${l}`);
          if (h === undefined) continue;
          out.push(
            encodeChain(
              encode,
              [
                [LadderOperatorUnit.Raise, i],
                [LadderOperatorUnit.Raise, j],
                [LadderOperatorUnit.Lower, k],
                [LadderOperatorUnit.Lower, l],
              ],
              n,
              h.mul(HALF)
            )
          );
        }
      }
    }
  }
  return out;
}

export function computeHamiltonianWith(
  encode: EncoderFn,
  factory: CoefficientFactory,
  n: number,
  options: HamiltonianOptions = {}
): PauliRegisterSequence {
  const oneBody = oneBodyTerms(encode, factory, n);
  const twoBody = twoBodyTerms(encode, factory, n);
  const total = PauliRegisterSequence.sum([...oneBody, ...twoBody]);
  const result = options.tolerance === undefined ? total : total.prune(options.tolerance);
  debug(
    LogComponent.HAMILTONIAN,
    `${oneBody.length} one-body and ${twoBody.length} two-body integrals -> ${result.size} Pauli terms`
  );
  return result;
}

/** Jordan-Wigner Hamiltonian. */
export function computeHamiltonian(factory: CoefficientFactory, n: number): PauliRegisterSequence {
  return computeHamiltonianWith(jordanWignerTerms, factory, n);
}
