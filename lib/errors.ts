export class MalformedInputError extends Error {
  readonly lapNumber: number | null;

  constructor(message: string, lapNumber: number | null = null) {
    super(message);
    this.name = 'MalformedInputError';
    this.lapNumber = lapNumber;
  }
}

/**
 * A lap whose sector runs disagree with the configured sectors, either in
 * number or in order. Raised per lap; the session summary records it as a
 * warning instead of failing.
 */
export class SectorMismatchError extends Error {
  readonly lapNumber: number;
  readonly expected: number;
  readonly actual: number;

  constructor(lapNumber: number, expected: number, actual: number, message?: string) {
    super(message ?? `Lap ${lapNumber} has ${actual} sector runs, expected ${expected}`);
    this.name = 'SectorMismatchError';
    this.lapNumber = lapNumber;
    this.expected = expected;
    this.actual = actual;
  }
}

export class InvalidRequestError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidRequestError';
  }
}
