import type { TransactionType } from '../entities/Transaction.js';
import { isPositiveDecimal } from './GermanDecimal.js';

const rules: Array<{ needle: string; type: TransactionType }> = [
  { needle: 'SEPA-ÜBERWEISUNG', type: 'XFER' },
  { needle: 'SEPA-LOHN/GEHALT', type: 'XFER' },
  { needle: 'SEPA-BASISLASTSCHRIFT', type: 'DIRECTDEBIT' },
  { needle: 'GIROCARD', type: 'POS' },
  { needle: 'nicht GIRO', type: 'POS' },
];

export const findTransactionType = (label: string): TransactionType | undefined => {
  return rules.find((rule) => label.includes(rule.needle))?.type;
};

export const classifyTransaction = (label: string | undefined, amount: string): TransactionType => {
  const found = label ? findTransactionType(label) : undefined;

  if (found) {
    return found;
  }

  return isPositiveDecimal(amount) ? 'CREDIT' : 'DEBIT';
};
