import crypto from 'node:crypto';

export interface TransactionHashInput {
  valueDate: string; // YYYYMMDD
  memo: string;
  amount: string;
  currency: string;
}

export const buildTransactionId = (input: TransactionHashInput): string => {
  const serialized = [input.memo.trim(), input.amount, input.currency].join(' ');
  const digest = crypto.createHash('sha1').update(serialized, 'utf8').digest('hex');

  return `${input.valueDate}${digest}`;
};
