export type SepaTag =
  | 'END_TO_END_REF'
  | 'CUSTOMER_REF'
  | 'MANDATE_REF'
  | 'CREDITOR_ID'
  | 'ORIGINATOR_ID'
  | 'IBAN'
  | 'BIC'
  | 'REF'
  | 'DIFFERENT_ORIGINATOR'
  | 'DIFFERENT_RECIPIENT';

export const sepaTagMarkers: Readonly<Record<string, SepaTag>> = {
  'EREF+': 'END_TO_END_REF', // Ende-zu-Ende-Referenz
  'KREF+': 'CUSTOMER_REF', // Kundenreferenz
  'MREF+': 'MANDATE_REF', // Mandatsreferenz
  'CRED+': 'CREDITOR_ID',
  'DEBT+': 'ORIGINATOR_ID',
  'IBAN+': 'IBAN',
  'BIC+': 'BIC',
  'SVWZ+': 'REF', // SEPA-Verwendungszweck
  'ABWA+': 'DIFFERENT_ORIGINATOR',
  'ABWE+': 'DIFFERENT_RECIPIENT',
};

export const derivedFieldNames = [
  'recipient',
  'type',
  'card_payment_reference',
  'card_payment_datetime',
  'card_payment_currency',
  'card_payment_amount',
  'pan',
  'card_expiration',
  'card_data_entry_method',
  'card_payment_auth_method',
] as const;

export type DerivedFieldName = (typeof derivedFieldNames)[number];

export type ReferenceField =
  | { kind: 'default'; value: string }
  | { kind: 'sepa'; tag: SepaTag; value: string }
  | { kind: 'derived'; name: DerivedFieldName; value: string }
  | { kind: 'unknown'; marker: string; value: string };

export const isDerivedFieldName = (name: string): name is DerivedFieldName => {
  return (derivedFieldNames as readonly string[]).includes(name);
};

export interface ReferenceFieldMap {
  default?: string;
  sepa: Partial<Record<SepaTag, string>>;
  derived: Partial<Record<DerivedFieldName, string>>;
  unknown: Record<string, string>;
}

/**
 * Folds a decoded field sequence into lookups. A tag seen twice keeps the
 * value of its last occurrence.
 */
export const toReferenceFieldMap = (fields: readonly ReferenceField[]): ReferenceFieldMap => {
  const map: ReferenceFieldMap = { sepa: {}, derived: {}, unknown: {} };

  for (const field of fields) {
    switch (field.kind) {
      case 'default':
        map.default = field.value;
        break;
      case 'sepa':
        map.sepa[field.tag] = field.value;
        break;
      case 'derived':
        map.derived[field.name] = field.value;
        break;
      case 'unknown':
        map.unknown[field.marker] = field.value;
        break;
    }
  }

  return map;
};
