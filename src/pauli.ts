import { Complex } from './complex';

export enum Pauli {
  I = 'I',
  X = 'X',
  Y = 'Y',
  Z = 'Z',
}

/** The phases a product of Pauli operators can pick up. */
export enum Phase {
  P1 = 'P1',
  M1 = 'M1',
  Pi = 'Pi',
  Mi = 'Mi',
}

export function phaseValue(phase: Phase): Complex {
  switch (phase) {
    case Phase.P1:
      return Complex.ONE;
    case Phase.M1:
      return Complex.MINUS_ONE;
    case Phase.Pi:
      return Complex.I;
    case Phase.Mi:
      return Complex.MINUS_I;
    default:
      const _exhaustive: never = phase;
      throw new Error(`Unknown phase ${_exhaustive}`);
  }
}

export function multiplyPhases(a: Phase, b: Phase): Phase {
  const v = phaseValue(a).mul(phaseValue(b));
  if (v.re === 1) return Phase.P1;
  if (v.re === -1) return Phase.M1;
  return v.im === 1 ? Phase.Pi : Phase.Mi;
}

export interface PauliProduct {
  readonly phase: Phase;
  readonly result: Pauli;
}

const product = (phase: Phase, result: Pauli): PauliProduct => ({ phase, result });

/** Single-qubit product `a · b`. */
export function multiplyPauli(a: Pauli, b: Pauli): PauliProduct {
  if (a === Pauli.I) return product(Phase.P1, b);
  if (b === Pauli.I || a === b) return product(Phase.P1, a === b ? Pauli.I : a);
  switch (a) {
    case Pauli.X:
      return b === Pauli.Y ? product(Phase.Pi, Pauli.Z) : product(Phase.Mi, Pauli.Y);
    case Pauli.Y:
      return b === Pauli.Z ? product(Phase.Pi, Pauli.X) : product(Phase.Mi, Pauli.Z);
    case Pauli.Z:
      return b === Pauli.X ? product(Phase.Pi, Pauli.Y) : product(Phase.Mi, Pauli.X);
    default:
      const _exhaustive: never = a;
      throw new Error(`Unknown Pauli ${_exhaustive}`);
  }
}

export function parsePauli(ch: string): Pauli | undefined {
  switch (ch) {
    case 'I':
      return Pauli.I;
    case 'X':
      return Pauli.X;
    case 'Y':
      return Pauli.Y;
    case 'Z':
      return Pauli.Z;
    default:
      return undefined;
  }
}
