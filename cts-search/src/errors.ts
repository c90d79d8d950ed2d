export class SearchQueryError extends Error {
  override readonly name: string = 'SearchQueryError';

  constructor(
    message: string,
    override readonly cause?: unknown,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidCriteriaError extends SearchQueryError {
  override readonly name = 'InvalidCriteriaError';

  constructor(
    readonly operator: 'and' | 'or',
    message?: string,
  ) {
    super(message ?? `Composite '${operator}' criteria requires at least one child`);
  }
}

export class InvalidPaginationError extends SearchQueryError {
  override readonly name = 'InvalidPaginationError';

  constructor(
    readonly field: 'skip' | 'limit',
    readonly value: number,
    message?: string,
  ) {
    super(
      message ??
        (field === 'limit'
          ? `limit must be a positive integer, got ${value}`
          : `skip must be a non-negative integer, got ${value}`),
    );
  }
}

export class UnsupportedValueError extends SearchQueryError {
  override readonly name = 'UnsupportedValueError';

  constructor(
    readonly value: unknown,
    message?: string,
  ) {
    super(message ?? `Cannot format criteria value: ${String(value)}`);
  }
}
