import { composeIBAN, electronicFormatIBAN, extractBIC, extractIBAN, isValidBIC, isValidIBAN } from 'ibantools';
import type { BankIdentifierPort, Bic, Iban } from '../../../application/ports/BankIdentifierPort.js';
import { BankIdentifierError } from '../../../domain/errors/StatementErrors.js';
import type { GermanBankRegistry } from './GermanBankRegistry.js';

const BBAN_ACCOUNT_DIGITS = 10;

export class IbanToolsBankIdentifierAdapter implements BankIdentifierPort {
  constructor(private readonly registry: GermanBankRegistry) {}

  parseIban(value: string): Iban {
    const electronic = electronicFormatIBAN(value);

    if (!electronic || !isValidIBAN(electronic)) {
      throw new BankIdentifierError('IBAN', value);
    }

    const extracted = extractIBAN(electronic);

    return {
      value: electronic,
      countryCode: extracted.countryCode ?? electronic.slice(0, 2),
      ...(extracted.bankIdentifier ? { bankCode: extracted.bankIdentifier } : {}),
    };
  }

  parseBic(value: string): Bic {
    const normalized = value.trim().toUpperCase();

    if (!isValidBIC(normalized)) {
      throw new BankIdentifierError('BIC', value);
    }

    const extracted = extractBIC(normalized);
    // extractBIC fills in a placeholder branch for 8-character BICs.
    const branchCode = normalized.length === 11 ? extracted.branchCode : undefined;

    return {
      value: normalized,
      countryCode: extracted.countryCode ?? normalized.slice(4, 6),
      ...(branchCode ? { branchCode } : {}),
    };
  }

  bicForIban(iban: Iban): Bic | undefined {
    if (iban.countryCode !== 'DE' || !iban.bankCode) {
      return undefined;
    }

    const entry = this.registry.findByBankCode(iban.bankCode);
    return entry ? this.parseBic(entry.bic) : undefined;
  }

  bankCodeForBic(bic: Bic): string | undefined {
    return this.registry.findByBic(bic.value)?.bankCode;
  }

  generateIban(params: { countryCode: string; bankCode: string; accountNumber: string }): Iban {
    const accountNumber = params.accountNumber.trim().padStart(BBAN_ACCOUNT_DIGITS, '0');
    const composed = composeIBAN({ countryCode: params.countryCode, bban: `${params.bankCode}${accountNumber}` });

    if (!composed) {
      throw new BankIdentifierError('IBAN', `${params.countryCode} ${params.bankCode} ${params.accountNumber}`);
    }

    return this.parseIban(composed);
  }
}
