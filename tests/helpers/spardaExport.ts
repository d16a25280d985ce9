export interface ExportRow {
  bookingDate: string;
  valueDate: string;
  reference: string;
  amount: string;
  currency?: string;
}

export interface ExportOptions {
  title?: string;
  customerName?: string;
  customerNumber?: string;
  startDate?: string;
  endDate?: string;
  accountNumber?: string;
  balance?: string;
  currency?: string;
  rows?: ExportRow[];
}

export const TRANSACTION_COLUMNS = ['Buchungstag', 'Wertstellungstag', 'Verwendungszweck', 'Umsatz', 'Währung'];

export const quoteRow = (fields: string[]): string => {
  return fields.map((field) => `"${field.replace(/"/g, '""')}"`).join(';');
};

/**
 * Re-applies the export's hard wrap: a space after the first 53 characters
 * and after every 54 characters from there on.
 */
export const wrapLikeExport = (reference: string): string => {
  let wrapped = '';
  let rest = reference;
  let width = 53;

  while (rest.length > width) {
    wrapped += `${rest.slice(0, width)} `;
    rest = rest.slice(width);
    width = 54;
  }

  return wrapped + rest;
};

export const headerLines = (options: ExportOptions = {}): string[] => [
  quoteRow([options.title ?? 'Umsätze SpardaGiro']),
  '',
  quoteRow(['Kontoinhaber:', options.customerName ?? 'Erika Mustermann']),
  quoteRow(['Kundennummer:', options.customerNumber ?? '7654321']),
  '',
  quoteRow(['Umsätze ab', 'Enddatum', 'Kontonummer', 'Saldo', 'Währung']),
  quoteRow([
    options.startDate ?? '01.01.2024',
    options.endDate ?? '13.02.2024',
    options.accountNumber ?? '1234567',
    options.balance ?? '1.234,56',
    options.currency ?? 'EUR',
  ]),
  quoteRow(['Weitere gewählte Suchoptionen:', 'keine']),
  '',
  '',
];

export const exportLines = (options: ExportOptions = {}): string[] => [
  ...headerLines(options),
  quoteRow(TRANSACTION_COLUMNS),
  ...(options.rows ?? []).map((row) =>
    quoteRow([row.bookingDate, row.valueDate, wrapLikeExport(row.reference), row.amount, row.currency ?? 'EUR']),
  ),
];

export const toExportText = (lines: string[]): string => `${lines.join('\n')}\n`;

export const buildExport = (options: ExportOptions = {}): Buffer => {
  return Buffer.from(toExportText(exportLines(options)), 'latin1');
};

export const CARD_PAYMENT_REFERENCE =
  'EDEKA Markt 0815 Berlin 12.02.2024 14.33.12 123456 EUR  -23,45 EC 60123456 0 ' +
  'PAN 1234567890123456789 EDEKA MARKT BERLIN001 12/2027 GIROCARD KTLS/ONLN/1';
