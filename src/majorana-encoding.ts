import { Complex } from './complex';
import { LogComponent, LogLevel, logTerm } from './debug-logger';
import * as fenwick from './fenwick-tree';
import { LadderOperatorUnit } from './ladder';
import { Pauli } from './pauli';
import { PauliRegister, PauliRegisterSequence } from './pauli-register';

/**
 * The three index sets that determine an index-set based encoding.
 * Encodings are data: Jordan-Wigner, Bravyi-Kitaev and Parity differ only
 * in these functions.
 */
export interface EncodingScheme {
  update(j: number, n: number): ReadonlySet<number>;
  parity(j: number): ReadonlySet<number>;
  occupation(j: number): ReadonlySet<number>;
}

const range = (from: number, to: number): number[] =>
  Array.from({ length: Math.max(0, to - from) }, (_, i) => from + i);

type Assignment = readonly [number, Pauli];

/**
 * Builds a register from (qubit, Pauli) pairs in priority order: the first
 * assignment to a qubit wins.
 */
function assign(n: number, pairs: readonly Assignment[]): PauliRegister {
  const seen = new Map<number, Pauli>();
  for (const [q, p] of pairs) {
    if (q >= 0 && q < n && !seen.has(q)) seen.set(q, p);
  }
  return PauliRegister.fromAssignments(n, seen);
}

function tagged(qubits: Iterable<number>, p: Pauli): Assignment[] {
  return [...qubits].map((q): Assignment => [q, p]);
}

/** c_j: X on `{j} ∪ U(j)`, Z on `P(j)`. */
export function cMajorana(scheme: EncodingScheme, j: number, n: number): PauliRegister {
  const own: Assignment = [j, Pauli.X];
  return assign(n, [
    own,
    ...tagged(scheme.update(j, n), Pauli.X),
    ...tagged(scheme.parity(j), Pauli.Z),
  ]);
}

/** d_j: Y on j, X on `U(j)`, Z on `(P(j) ⊕ O(j)) \ {j}`. */
export function dMajorana(scheme: EncodingScheme, j: number, n: number): PauliRegister {
  const zs = fenwick.symmetricDifference(scheme.parity(j), scheme.occupation(j));
  zs.delete(j);
  const own: Assignment = [j, Pauli.Y];
  return assign(n, [
    own,
    ...tagged(scheme.update(j, n), Pauli.X),
    ...tagged(zs, Pauli.Z),
  ]);
}

/**
 * Combines two Majorana strings into a ladder operator:
 * `a† = ½(c − i d)`, `a = ½(c + i d)`.
 */
export function ladderFromMajoranas(
  op: LadderOperatorUnit,
  c: PauliRegister,
  d: PauliRegister
): PauliRegisterSequence {
  const dCoeff = op === LadderOperatorUnit.Raise ? new Complex(0, -0.5) : new Complex(0, 0.5);
  return PauliRegisterSequence.of(c.withCoefficient(Complex.real(0.5)), d.withCoefficient(dCoeff));
}

export function encodeOperator(
  scheme: EncodingScheme,
  op: LadderOperatorUnit,
  j: number,
  n: number
): PauliRegisterSequence {
  if (op === LadderOperatorUnit.Identity || j >= n) return PauliRegisterSequence.EMPTY;
  const result = ladderFromMajoranas(op, cMajorana(scheme, j, n), dMajorana(scheme, j, n));
  logTerm(LogComponent.ENCODING, LogLevel.TRACE, `encoded (${op}, ${j}) on ${n} qubits`, () =>
    result.terms.join(', ')
  );
  return result;
}

export const jordanWignerScheme: EncodingScheme = {
  update: () => new Set(),
  parity: (j) => new Set(range(0, j)),
  occupation: (j) => new Set([j]),
};

export const parityScheme: EncodingScheme = {
  update: (j, n) => new Set(range(j + 1, n)),
  parity: (j) => new Set(j > 0 ? [j - 1] : []),
  occupation: (j) => new Set(j > 0 ? [j - 1, j] : [j]),
};

export const bravyiKitaevScheme: EncodingScheme = {
  update: fenwick.updateSet,
  parity: fenwick.paritySet,
  occupation: fenwick.occupationSet,
};

export const jordanWignerTerms = (op: LadderOperatorUnit, j: number, n: number) =>
  encodeOperator(jordanWignerScheme, op, j, n);

export const bravyiKitaevTerms = (op: LadderOperatorUnit, j: number, n: number) =>
  encodeOperator(bravyiKitaevScheme, op, j, n);

export const parityTerms = (op: LadderOperatorUnit, j: number, n: number) =>
  encodeOperator(parityScheme, op, j, n);
