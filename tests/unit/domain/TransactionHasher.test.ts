import crypto from 'node:crypto';
import { describe, expect, it } from 'vitest';
import { buildTransactionId } from '../../../src/domain/services/TransactionHasher.js';

const input = { valueDate: '20240212', memo: 'SVWZ+ Rent payment EREF+ X123', amount: '-850.00', currency: 'EUR' };

describe('buildTransactionId', () => {
  it('prefixes the value date to a SHA-1 of memo, amount and currency', () => {
    expect(buildTransactionId(input)).toBe('202402120432c9b9bd149ab572201f0cb0aea5992577f6fa');
  });

  it('trims the memo before hashing', () => {
    expect(buildTransactionId({ ...input, memo: `  ${input.memo} ` })).toBe(buildTransactionId(input));
  });

  it('hashes UTF-8 bytes', () => {
    const expected = crypto.createHash('sha1').update(Buffer.from('Bäckerei 1.00 EUR', 'utf8')).digest('hex');
    expect(buildTransactionId({ valueDate: '20240101', memo: 'Bäckerei', amount: '1.00', currency: 'EUR' })).toBe(
      `20240101${expected}`,
    );
  });

  it('is deterministic and changes with every input', () => {
    const id = buildTransactionId(input);

    expect(buildTransactionId({ ...input })).toBe(id);
    expect(buildTransactionId({ ...input, valueDate: '20240213' })).not.toBe(id);
    expect(buildTransactionId({ ...input, memo: 'SVWZ+ Rent payment EREF+ X124' })).not.toBe(id);
    expect(buildTransactionId({ ...input, amount: '-850.01' })).not.toBe(id);
    expect(buildTransactionId({ ...input, currency: 'USD' })).not.toBe(id);
  });
});
