/** Raised for any condition that must abort the whole import. */
export class ImportError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ImportError';
  }
}

export class FieldNameError extends ImportError {
  constructor(
    readonly header: string,
    readonly fieldName: string,
  ) {
    super(`Column "${header}" normalizes to "${fieldName}", which must be a valid identifier`);
    this.name = 'FieldNameError';
  }
}

export class CategoryLookupError extends ImportError {
  constructor(
    readonly field: string,
    readonly value: string | null,
    readonly choices: string[],
    message: string,
  ) {
    super(message);
    this.name = 'CategoryLookupError';
  }
}
