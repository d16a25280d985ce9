import type { BankAccount } from './Account.js';
import type { ReferenceField } from './ReferenceField.js';

export type TransactionType = 'XFER' | 'DIRECTDEBIT' | 'POS' | 'CREDIT' | 'DEBIT';

export interface TransactionRecord {
  readonly id: string;
  readonly bookingDate: string; // ISO timestamp
  readonly valueDate: string; // ISO timestamp
  readonly date: string; // authoritative date, equals valueDate
  readonly userDate: string; // value date unless a card payment time was decoded
  readonly memo: string;
  readonly amount: string; // canonical signed decimal, e.g. "-5.00"
  readonly currency: string;
  readonly type: TransactionType;
  readonly bankAccountTo?: BankAccount;
  readonly endToEndReference?: string;
  readonly payee?: string;
  readonly referenceFields: readonly ReferenceField[];
}
