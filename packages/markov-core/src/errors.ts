export class MarkovError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class InvalidArgumentError extends MarkovError {}

export class ValueMismatchError extends MarkovError {
  readonly expected: number;
  readonly actual: number;

  constructor(expected: number, actual: number) {
    super(`N-gram lengths ${expected} and ${actual} do not match`);
    this.expected = expected;
    this.actual = actual;
  }
}
