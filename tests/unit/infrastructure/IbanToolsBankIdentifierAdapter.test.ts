import { describe, expect, it } from 'vitest';
import { BankIdentifierError, ConfigurationError } from '../../../src/domain/errors/StatementErrors.js';
import {
  GermanBankRegistry,
  parseBankCodeFile,
} from '../../../src/infrastructure/adapters/banking/GermanBankRegistry.js';
import { IbanToolsBankIdentifierAdapter } from '../../../src/infrastructure/adapters/banking/IbanToolsBankIdentifierAdapter.js';

const registry = new GermanBankRegistry([
  { bankCode: '37040044', bic: 'COBADEFFXXX', name: 'Commerzbank' },
  { bankCode: '36060591', bic: 'GENODED1SPE', name: 'Sparda-Bank West' },
]);
const adapter = new IbanToolsBankIdentifierAdapter(registry);

describe('IbanToolsBankIdentifierAdapter', () => {
  it('parses IBANs written in groups', () => {
    expect(adapter.parseIban('DE89 3704 0044 0532 0130 00')).toEqual({
      value: 'DE89370400440532013000',
      countryCode: 'DE',
      bankCode: '37040044',
    });
  });

  it('rejects IBANs with a wrong checksum', () => {
    expect(() => adapter.parseIban('DE00370400440532013000')).toThrow(BankIdentifierError);
  });

  it('parses BICs with and without branch', () => {
    expect(adapter.parseBic('GENODED1SPE')).toEqual({ value: 'GENODED1SPE', countryCode: 'DE', branchCode: 'SPE' });
    expect(adapter.parseBic('genoded1')).toEqual({ value: 'GENODED1', countryCode: 'DE' });
    expect(() => adapter.parseBic('1234DEFF')).toThrow('Invalid BIC "1234DEFF"');
  });

  it('derives the BIC of a German IBAN from the registry', () => {
    const iban = adapter.parseIban('DE89370400440532013000');
    expect(adapter.bicForIban(iban)?.value).toBe('COBADEFFXXX');
    expect(adapter.bicForIban({ value: 'AT611904300234573201', countryCode: 'AT', bankCode: '19043' })).toBeUndefined();
  });

  it('looks up the bank code of a BIC', () => {
    expect(adapter.bankCodeForBic(adapter.parseBic('GENODED1SPE'))).toBe('36060591');
    expect(adapter.bankCodeForBic(adapter.parseBic('COBADEFF'))).toBe('37040044');
    expect(adapter.bankCodeForBic(adapter.parseBic('INGDDEFFXXX'))).toBeUndefined();
  });

  it('generates an IBAN from bank code and account number', () => {
    expect(adapter.generateIban({ countryCode: 'DE', bankCode: '36060591', accountNumber: '1234567' })).toEqual({
      value: 'DE45360605910001234567',
      countryCode: 'DE',
      bankCode: '36060591',
    });
  });
});

describe('GermanBankRegistry', () => {
  it('loads the bundled registry', () => {
    expect(GermanBankRegistry.fromFile().findByBic('GENODED1SPE')?.bankCode).toBe('36060591');
  });

  it('bundles every Sparda-Bank institution', () => {
    const bundled = GermanBankRegistry.fromFile();
    const spardaBics = ['S01', 'S02', 'S03', 'S04', 'S05', 'S06', 'S09', 'S10', 'S11', 'S12'].map((branch) => `GENODEF1${branch}`);

    expect(spardaBics.map((bic) => bundled.findByBic(bic)?.bankCode)).toEqual([
      '55090500',
      '60090800',
      '72090500',
      '70090500',
      '75090500',
      '76090500',
      '25090500',
      '12096597',
      '20690500',
      '50090500',
    ]);
    expect(bundled.findByBic('GENODED1SPK')?.bankCode).toBe('37060590');
  });

  it('reads the Bundesbank bank code file', () => {
    const blz = GermanBankRegistry.fromFile('tests/fixtures/blz-sample.txt');

    expect(blz.findByBankCode('70090500')).toEqual({
      bankCode: '70090500',
      bic: 'GENODEF1S04',
      name: 'Sparda-Bank München eG',
    });
    expect(blz.findByBic('BYLADEM1001')?.bankCode).toBe('12030000');
    expect(blz.findByBankCode('37040044')).toBeUndefined();
  });

  it('skips bank code records without a BIC', () => {
    const branchOffice = `700905002${'Sparda-Bank München eG'.padEnd(58)}80335${'München'.padEnd(35)}`;

    expect(parseBankCodeFile(`${branchOffice}\n\n`)).toEqual([]);
  });

  it('reports a malformed bank code record with its line', () => {
    const record = `7009050X1${'Sparda-Bank München eG'.padEnd(58)}${' '.repeat(72)}GENODEF1S04`;

    expect(() => parseBankCodeFile(`\n${record}\n`, 'blz.txt')).toThrow(/^Malformed record in blz\.txt at line 2: /);
  });

  it('reports an unreadable registry as a configuration error', () => {
    expect(() => GermanBankRegistry.fromFile('tests/fixtures/missing-registry.json')).toThrow(ConfigurationError);
  });
});
