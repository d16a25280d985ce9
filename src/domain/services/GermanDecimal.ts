import { InvalidFieldError } from '../errors/StatementErrors.js';

const decimalPattern = /^([+-]?)(\d*)(?:\.(\d*))?$/;

/**
 * Decodes an amount written with `.` thousands separators and a decimal
 * comma into a canonical decimal string: `"1.234,56"` → `"1234.56"`,
 * `"-5,00"` → `"-5.00"`. Fraction digits are kept as written.
 */
export const parseGermanDecimal = (raw: string, field = 'amount'): string => {
  const candidate = raw.trim().replace(/\./g, '').replace(/,/g, '.');
  const match = decimalPattern.exec(candidate);

  if (!match || (!match[2] && !match[3])) {
    throw new InvalidFieldError(field, raw, 'not a decimal number');
  }

  const [, sign, integerDigits, fractionDigits] = match;
  const integer = integerDigits.replace(/^0+(?=\d)/, '') || '0';
  const fraction = fractionDigits ? `.${fractionDigits}` : '';

  return `${sign === '-' ? '-' : ''}${integer}${fraction}`;
};

export const isPositiveDecimal = (value: string): boolean => Number(value) > 0;
