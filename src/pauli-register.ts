import { Complex } from './complex';
import { LogComponent, trace } from './debug-logger';
import { Pauli, Phase, multiplyPauli, multiplyPhases, parsePauli, phaseValue } from './pauli';

/**
 * A tensor product of single-qubit Pauli operators with a complex
 * coefficient. Qubit 0 is the leftmost character of the signature.
 */
export class PauliRegister {
  readonly operators: readonly Pauli[];
  readonly coefficient: Complex;

  constructor(operators: readonly Pauli[], coefficient: Complex = Complex.ONE) {
    this.operators = operators;
    this.coefficient = coefficient.reduce();
  }

  static identity(n: number, coefficient: Complex = Complex.ONE): PauliRegister {
    return new PauliRegister(new Array<Pauli>(n).fill(Pauli.I), coefficient);
  }

  static fromString(signature: string, coefficient: Complex = Complex.ONE): PauliRegister {
    const ops = [...signature].map((ch, i) => {
      const p = parsePauli(ch);
      if (p === undefined)
        throw new Error(`Invalid Pauli '${ch}' at ${i} in '${signature}'`);
      return p;
    });
    return new PauliRegister(ops, coefficient);
  }

  /**
   * Pauli operators at the given qubits, identity elsewhere. The register
   * always has `n` qubits; assignments outside `0..n-1` are ignored.
   */
  static fromAssignments(
    n: number,
    assignments: Iterable<readonly [number, Pauli]>,
    coefficient: Complex = Complex.ONE
  ): PauliRegister {
    const ops = new Array<Pauli>(n).fill(Pauli.I);
    for (const [qubit, p] of assignments) {
      if (Number.isInteger(qubit) && qubit >= 0 && qubit < n) ops[qubit] = p;
    }
    return new PauliRegister(ops, coefficient);
  }

  get size(): number {
    return this.operators.length;
  }

  get signature(): string {
    return this.operators.join('');
  }

  /** Number of non-identity positions. */
  get weight(): number {
    return this.operators.filter((p) => p !== Pauli.I).length;
  }

  at(qubit: number): Pauli {
    return this.operators[qubit] ?? Pauli.I;
  }

  withCoefficient(coefficient: Complex): PauliRegister {
    return new PauliRegister(this.operators, coefficient);
  }

  scale(k: Complex): PauliRegister {
    return this.withCoefficient(this.coefficient.mul(k));
  }

  /** Positionwise product; the shorter register is padded with identity. */
  mul(other: PauliRegister): PauliRegister {
    const n = Math.max(this.size, other.size);
    const ops: Pauli[] = [];
    let phase = Phase.P1;
    for (let q = 0; q < n; q++) {
      const r = multiplyPauli(this.at(q), other.at(q));
      ops.push(r.result);
      phase = multiplyPhases(phase, r.phase);
    }
    return new PauliRegister(
      ops,
      this.coefficient.mul(other.coefficient).mul(phaseValue(phase))
    );
  }

  toString(): string {
    return `${this.coefficient} ${this.signature}`;
  }
}

function byKey(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * A canonical sum of Pauli registers keyed by signature. Registers with the
 * same signature are merged by adding coefficients; exact zeros are dropped.
 */
export class PauliRegisterSequence {
  private readonly bySignature: ReadonlyMap<string, PauliRegister>;

  constructor(registers: Iterable<PauliRegister> = []) {
    const map = new Map<string, PauliRegister>();
    for (const r of registers) {
      const existing = map.get(r.signature);
      map.set(
        r.signature,
        existing ? existing.withCoefficient(existing.coefficient.add(r.coefficient)) : r
      );
    }
    for (const [sig, r] of map) {
      if (r.coefficient.isZero()) map.delete(sig);
    }
    this.bySignature = map;
  }

  static readonly EMPTY = new PauliRegisterSequence();

  static of(...registers: PauliRegister[]): PauliRegisterSequence {
    return new PauliRegisterSequence(registers);
  }

  static sum(sequences: Iterable<PauliRegisterSequence>): PauliRegisterSequence {
    const all: PauliRegister[] = [];
    for (const s of sequences) all.push(...s.bySignature.values());
    return new PauliRegisterSequence(all);
  }

  get size(): number {
    return this.bySignature.size;
  }

  /** Registers ordered by signature. */
  get terms(): PauliRegister[] {
    return [...this.bySignature.entries()]
      .sort(([a], [b]) => byKey(a, b))
      .map(([, r]) => r);
  }

  get(signature: string): PauliRegister | undefined {
    return this.bySignature.get(signature);
  }

  coefficient(signature: string): Complex {
    return this.bySignature.get(signature)?.coefficient ?? Complex.ZERO;
  }

  /** Sum of the coefficients of all-identity registers. */
  identityCoefficient(): Complex {
    let c = Complex.ZERO;
    for (const r of this.bySignature.values()) {
      if (r.weight === 0) c = c.add(r.coefficient);
    }
    return c;
  }

  maxWeight(): number {
    let w = 0;
    for (const r of this.bySignature.values()) w = Math.max(w, r.weight);
    return w;
  }

  add(other: PauliRegisterSequence): PauliRegisterSequence {
    return PauliRegisterSequence.sum([this, other]);
  }

  mul(other: PauliRegisterSequence): PauliRegisterSequence {
    const products: PauliRegister[] = [];
    for (const l of this.bySignature.values()) {
      for (const r of other.bySignature.values()) products.push(l.mul(r));
    }
    const result = new PauliRegisterSequence(products);
    trace(
      LogComponent.PAULI,
      `${this.size} x ${other.size} registers -> ${result.size} terms`
    );
    return result;
  }

  scale(k: Complex): PauliRegisterSequence {
    return new PauliRegisterSequence(
      [...this.bySignature.values()].map((r) => r.scale(k))
    );
  }

  /** Drops registers whose coefficient magnitude is at most `tolerance`. */
  prune(tolerance: number): PauliRegisterSequence {
    return new PauliRegisterSequence(
      [...this.bySignature.values()].filter(
        (r) => r.coefficient.magnitude() > tolerance
      )
    );
  }

  equals(other: PauliRegisterSequence, tolerance = 0): boolean {
    if (this.size !== other.size) return false;
    for (const [sig, r] of this.bySignature) {
      const o = other.get(sig);
      if (!o || !r.coefficient.equals(o.coefficient, tolerance)) return false;
    }
    return true;
  }

  toString(): string {
    return this.terms.map((r) => r.toString()).join('\n');
  }
}
