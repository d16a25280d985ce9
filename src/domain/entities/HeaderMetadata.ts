import type { AccountType } from './Account.js';

export interface HeaderMetadata {
  readonly title: string;
  readonly accountType: AccountType;
  readonly customerName: string;
  readonly customerNumber: string;
  readonly startDate: string; // ISO timestamp, Europe/Berlin offset
  readonly endDate: string; // ISO timestamp, Europe/Berlin offset
  readonly accountNumber: string;
  readonly accountBalance: string; // as exported, e.g. "1.234,56"
  readonly accountCurrency: string;
}
