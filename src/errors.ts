/**
 * Raised when a position series cannot be read as shape (N, 2).
 */
export class ShapeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShapeError';
  }
}

/**
 * Raised when two series that must be index-aligned differ in length.
 */
export class LengthMismatchError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LengthMismatchError';
  }
}

/**
 * Raised for arguments of the right type but an unusable value.
 */
export class ValueError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValueError';
  }
}
