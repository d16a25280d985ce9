export interface Iban {
  readonly value: string; // electronic format, no spaces
  readonly countryCode: string;
  readonly bankCode?: string;
}

export interface Bic {
  readonly value: string;
  readonly countryCode: string;
  readonly branchCode?: string;
}

/**
 * Construct-or-fail access to IBAN and BIC values. `parseIban` and
 * `parseBic` throw `BankIdentifierError` on malformed input.
 */
export interface BankIdentifierPort {
  parseIban(value: string): Iban;
  parseBic(value: string): Bic;
  bicForIban(iban: Iban): Bic | undefined;
  bankCodeForBic(bic: Bic): string | undefined;
  generateIban(params: { countryCode: string; bankCode: string; accountNumber: string }): Iban;
}
