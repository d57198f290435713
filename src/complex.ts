/**
 * Immutable complex scalar used for every coefficient and phase.
 *
 * Arithmetic is plain IEEE arithmetic; `reduce()` is the one place where a
 * non-finite result (NaN or ±Infinity in either part) is clamped to zero.
 * The term types call it on construction.
 */
export class Complex {
  static readonly ZERO = new Complex(0, 0);
  static readonly ONE = new Complex(1, 0);
  static readonly MINUS_ONE = new Complex(-1, 0);
  static readonly I = new Complex(0, 1);
  static readonly MINUS_I = new Complex(0, -1);

  constructor(
    public readonly re: number,
    public readonly im: number = 0
  ) {}

  static real(re: number): Complex {
    return new Complex(re, 0);
  }

  add(other: Complex): Complex {
    return new Complex(this.re + other.re, this.im + other.im);
  }

  sub(other: Complex): Complex {
    return new Complex(this.re - other.re, this.im - other.im);
  }

  mul(other: Complex): Complex {
    return new Complex(
      this.re * other.re - this.im * other.im,
      this.re * other.im + this.im * other.re
    );
  }

  scale(k: number): Complex {
    return new Complex(this.re * k, this.im * k);
  }

  neg(): Complex {
    return new Complex(-this.re, -this.im);
  }

  conj(): Complex {
    return new Complex(this.re, -this.im);
  }

  magnitude(): number {
    return Math.hypot(this.re, this.im);
  }

  isFinite(): boolean {
    return Number.isFinite(this.re) && Number.isFinite(this.im);
  }

  /** Exact zero test; non-finite values count as zero. */
  isZero(): boolean {
    return !this.isFinite() || (this.re === 0 && this.im === 0);
  }

  reduce(): Complex {
    return this.isFinite() ? this : Complex.ZERO;
  }

  equals(other: Complex, tolerance = 0): boolean {
    return (
      Math.abs(this.re - other.re) <= tolerance &&
      Math.abs(this.im - other.im) <= tolerance
    );
  }

  toString(): string {
    if (this.im === 0) return `${this.re}`;
    if (this.re === 0) return `${this.im}i`;
    const sign = this.im < 0 ? '-' : '+';
    return `${this.re}${sign}${Math.abs(this.im)}i`;
  }
}
