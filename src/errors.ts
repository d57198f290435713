/**
 * Raised when a combining algebra breaks the one-or-two-terms-per-insertion
 * contract that normal ordering relies on.
 */
export class AlgebraLimitationError extends Error {
  constructor(
    message: string,
    public readonly produced: number
  ) {
    super(message);
    this.name = 'AlgebraLimitationError';
  }
}

/**
 * Raised for trees the path-based encoding cannot handle.
 */
export class TreeShapeError extends Error {
  constructor(
    message: string,
    public readonly node?: number
  ) {
    super(message);
    this.name = 'TreeShapeError';
  }
}

export class ParseError extends Error {
  constructor(
    message: string,
    public readonly pos: number
  ) {
    super(`${message} at ${pos}`);
    this.name = 'ParseError';
  }
}
