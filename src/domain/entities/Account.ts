export type AccountType = 'CHECKING' | 'SAVINGS';

const accountTypeMarkers: Array<[needle: string, type: AccountType]> = [
  ['SpardaGiro', 'CHECKING'],
  ['SpardaYoung', 'CHECKING'],
  ['SpardaTagesgeld', 'SAVINGS'],
];

export const findAccountType = (title: string): AccountType | undefined => {
  return accountTypeMarkers.find(([needle]) => title.includes(needle))?.[1];
};

export interface BankAccount {
  bankId: string; // BIC
  accountId: string; // IBAN
  branchId?: string;
}
