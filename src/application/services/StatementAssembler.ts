import type { HeaderMetadata } from '../../domain/entities/HeaderMetadata.js';
import type { Statement } from '../../domain/entities/Statement.js';
import type { TransactionRecord } from '../../domain/entities/Transaction.js';
import { parseGermanDecimal } from '../../domain/services/GermanDecimal.js';
import type { BankIdentifierPort, Bic } from '../ports/BankIdentifierPort.js';

export class StatementAssembler {
  constructor(
    private readonly bankIdentifiers: BankIdentifierPort,
    private readonly bic: Bic,
  ) {}

  assemble(metadata: HeaderMetadata, transactions: TransactionRecord[]): Statement {
    return {
      metadata,
      bankId: this.bic.value,
      accountId: this.resolveAccountIban(metadata.accountNumber),
      accountType: metadata.accountType,
      currency: metadata.accountCurrency,
      startDate: metadata.startDate,
      endDate: metadata.endDate,
      endBalance: parseGermanDecimal(metadata.accountBalance, 'account balance'),
      transactions,
    };
  }

  private resolveAccountIban(accountNumber: string): string | undefined {
    const bankCode = this.bankIdentifiers.bankCodeForBic(this.bic);

    if (!bankCode) {
      console.warn(`⚠️ No bank code registered for BIC ${this.bic.value}, account IBAN left unset`);
      return undefined;
    }

    return this.bankIdentifiers.generateIban({ countryCode: 'DE', bankCode, accountNumber }).value;
  }
}
