import { findAccountType } from '../../../domain/entities/Account.js';
import type { HeaderMetadata } from '../../../domain/entities/HeaderMetadata.js';
import { StructuralMismatchError } from '../../../domain/errors/StatementErrors.js';
import { describeIssues, HeaderSummarySchema } from '../../../application/dto/SpardaRowDTO.js';
import { isBlankRow, toRecord, type RowCursor } from '../csv/SpardaCsvReader.js';

const expectFields = (cursor: RowCursor, count: number): string[] => {
  const row = cursor.next();

  if (row.length !== count) {
    throw new StructuralMismatchError(`expected ${count} field(s), found ${row.length}`, cursor.rowNumber);
  }

  return row;
};

const expectBlank = (cursor: RowCursor): void => {
  const row = cursor.next();

  if (!isBlankRow(row)) {
    throw new StructuralMismatchError(`expected an empty row, found ${JSON.stringify(row)}`, cursor.rowNumber);
  }
};

const expectLabelled = (cursor: RowCursor, label: string): string => {
  const [actual, value] = expectFields(cursor, 2);

  if (actual !== label) {
    throw new StructuralMismatchError(`expected label ${JSON.stringify(label)}, found ${JSON.stringify(actual)}`, cursor.rowNumber);
  }

  return value;
};

/**
 * Reads the preamble of an export, up to and including the blank rows in
 * front of the transaction column names. Any deviation from the known
 * layout aborts with `StructuralMismatchError`.
 */
export const readHeader = (cursor: RowCursor): HeaderMetadata => {
  const [title] = expectFields(cursor, 1);

  if (!title) {
    throw new StructuralMismatchError('expected a title, found an empty row', cursor.rowNumber);
  }

  expectBlank(cursor);

  const customerName = expectLabelled(cursor, 'Kontoinhaber:');
  const customerNumber = expectLabelled(cursor, 'Kundennummer:');
  expectBlank(cursor);

  const summaryColumns = cursor.next();
  const summaryValues = cursor.nextNonBlank();
  const summary = HeaderSummarySchema.safeParse(toRecord(summaryColumns, summaryValues));

  if (!summary.success) {
    throw new StructuralMismatchError(`account summary: ${describeIssues(summary.error)}`, cursor.rowNumber);
  }

  const searchOptions = expectLabelled(cursor, 'Weitere gewählte Suchoptionen:');

  if (searchOptions !== 'keine') {
    throw new StructuralMismatchError(`expected no further search options, found ${JSON.stringify(searchOptions)}`, cursor.rowNumber);
  }

  expectBlank(cursor);
  expectBlank(cursor);

  return {
    title,
    accountType: findAccountType(title) ?? 'CHECKING',
    customerName,
    customerNumber,
    startDate: summary.data['Umsätze ab'],
    endDate: summary.data.Enddatum,
    accountNumber: summary.data.Kontonummer,
    accountBalance: summary.data.Saldo,
    accountCurrency: summary.data.Währung,
  };
};
