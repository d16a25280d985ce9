export class StatementParseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** The export does not have the expected row shape, field count or label. */
export class StructuralMismatchError extends StatementParseError {
  constructor(
    message: string,
    readonly rowNumber?: number,
  ) {
    super(rowNumber === undefined ? message : `Row ${rowNumber}: ${message}`);
  }
}

/** A value required to build a row could not be decoded. */
export class InvalidFieldError extends StatementParseError {
  constructor(
    readonly field: string,
    readonly rawValue: string,
    reason: string,
  ) {
    super(`Invalid ${field} ${JSON.stringify(rawValue)}: ${reason}`);
  }
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class BankIdentifierError extends Error {
  constructor(
    readonly kind: 'IBAN' | 'BIC',
    readonly rawValue: string,
  ) {
    super(`Invalid ${kind} ${JSON.stringify(rawValue)}`);
    this.name = 'BankIdentifierError';
  }
}
