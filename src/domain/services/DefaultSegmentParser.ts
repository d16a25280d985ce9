import { isDerivedFieldName, type DerivedFieldName } from '../entities/ReferenceField.js';

export type DerivedField = { kind: 'derived'; name: DerivedFieldName; value: string };

export interface DefaultSegment {
  residual: string;
  fields: DerivedField[];
}

export const transactionTypeSuffixes = ['SEPA-ÜBERWEISUNG', 'SEPA-LOHN/GEHALT', 'SEPA-BASISLASTSCHRIFT'] as const;

// Kept literally: each piece mirrors a quirk of how the bank prints card payments.
const cardPaymentPattern = new RegExp(
  [
    String.raw`(?<card_payment_reference>.*)`,
    String.raw`(?<card_payment_datetime>\d{2}\.\d{2}\.\d{4} \d{2}\.\d{2}\.\d{2}) `,
    String.raw`(?:OFFLIN|\d{6}) `,
    String.raw`(?<card_payment_currency>[A-Z]{3})\s+`,
    String.raw`(?<card_payment_amount>-?\d+,\d{2}) `,
    String.raw`EC\s+[A-Z]*\d+\s*\d*\s*`,
    String.raw`PAN (?<pan>\d+) `,
    String.raw`(?<recipient>.*?)\d{3} `,
    String.raw`(?<card_expiration>\d{2}/\d{4}) `,
    String.raw`(?<type>GIROCARD|nicht GIRO) `,
    String.raw`(?<card_data_entry_method>[A-Z]{4})/`,
    String.raw`(?<card_payment_auth_method>[A-Z]{4})/+\d*`,
  ].join(''),
);

const derived = (name: DerivedFieldName, value: string): DerivedField => ({ kind: 'derived', name, value });

/**
 * Decodes the untagged leading text of a reference. A trailing transaction
 * type label splits off the counterparty name; otherwise a card payment
 * line is taken apart into its parts.
 */
export const parseDefaultSegment = (value: string): DefaultSegment => {
  for (const suffix of transactionTypeSuffixes) {
    if (value.endsWith(suffix)) {
      return {
        residual: '',
        fields: [derived('type', suffix), derived('recipient', value.slice(0, -suffix.length))],
      };
    }
  }

  const match = cardPaymentPattern.exec(value);

  if (match?.groups) {
    const fields = Object.entries(match.groups)
      .filter((entry): entry is [DerivedFieldName, string] => isDerivedFieldName(entry[0]) && entry[1] !== undefined)
      .map(([name, groupValue]) => derived(name, groupValue));

    return { residual: value.slice(0, match.index), fields };
  }

  return { residual: value, fields: [] };
};
