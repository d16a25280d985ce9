import type { AccountType } from './Account.js';
import type { HeaderMetadata } from './HeaderMetadata.js';
import type { TransactionRecord } from './Transaction.js';

export interface Statement {
  metadata: HeaderMetadata;
  bankId: string; // configured BIC
  accountId?: string; // IBAN, set when the bank code of the BIC is known
  accountType: AccountType;
  currency: string;
  startDate: string; // ISO timestamp
  endDate: string; // ISO timestamp
  endBalance: string; // canonical decimal
  transactions: TransactionRecord[];
}
