import { describe, expect, it } from 'vitest';
import { classifyTransaction, findTransactionType } from '../../../src/domain/services/TransactionTypeClassifier.js';

describe('findTransactionType', () => {
  it('maps known labels', () => {
    expect(findTransactionType('SEPA-ÜBERWEISUNG')).toBe('XFER');
    expect(findTransactionType('SEPA-LOHN/GEHALT')).toBe('XFER');
    expect(findTransactionType('SEPA-BASISLASTSCHRIFT')).toBe('DIRECTDEBIT');
    expect(findTransactionType('GIROCARD')).toBe('POS');
    expect(findTransactionType('nicht GIRO')).toBe('POS');
    expect(findTransactionType('DAUERAUFTRAG')).toBeUndefined();
  });
});

describe('classifyTransaction', () => {
  it('prefers the decoded label over the amount sign', () => {
    expect(classifyTransaction('SEPA-BASISLASTSCHRIFT', '10.00')).toBe('DIRECTDEBIT');
  });

  it('falls back to the amount sign', () => {
    expect(classifyTransaction(undefined, '12.30')).toBe('CREDIT');
    expect(classifyTransaction(undefined, '-12.30')).toBe('DEBIT');
    expect(classifyTransaction('DAUERAUFTRAG', '0.00')).toBe('DEBIT');
  });
});
