/**
 * Reference Registry Errors
 *
 * Every failure is synchronous and local to the call that raised it,
 * except AggregationMismatchError which rejects on every worker of a
 * collective reduction.
 */

export class ReferenceRegistryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ReferenceRegistryError';
  }
}

export class CapacityExceededError extends ReferenceRegistryError {
  readonly capacity: number;

  constructor(capacity: number) {
    super(`Reference registry is full (capacity ${capacity})`);
    this.name = 'CapacityExceededError';
    this.capacity = capacity;
  }
}

export class InvalidHandleError extends ReferenceRegistryError {
  readonly handle: number;

  constructor(handle: number, count: number) {
    super(`Reference handle ${handle} is out of range [1, ${count}]`);
    this.name = 'InvalidHandleError';
    this.handle = handle;
  }
}

export class MissingAuthorError extends ReferenceRegistryError {
  constructor() {
    super('Record has no first author to derive a citation key from');
    this.name = 'MissingAuthorError';
  }
}

export class InvalidYearError extends ReferenceRegistryError {
  readonly year: string;

  constructor(year: string) {
    super(`Record year must be exactly 4 characters, got "${year}"`);
    this.name = 'InvalidYearError';
    this.year = year;
  }
}

export class DegenerateKeyError extends ReferenceRegistryError {
  readonly candidate: string;

  constructor(candidate: string, reason: string) {
    super(`Cannot derive citation key "${candidate}": ${reason}`);
    this.name = 'DegenerateKeyError';
    this.candidate = candidate;
  }
}

export class AggregationMismatchError extends ReferenceRegistryError {
  constructor(message: string) {
    super(message);
    this.name = 'AggregationMismatchError';
  }
}
