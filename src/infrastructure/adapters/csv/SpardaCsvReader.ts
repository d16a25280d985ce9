import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { StructuralMismatchError } from '../../../domain/errors/StatementErrors.js';

const RowsSchema = z.array(z.array(z.string()));

/**
 * Tokenizes a decoded export: `;` delimited, every field double-quoted,
 * rows of varying length.
 */
export const readSpardaRows = (text: string): string[][] => {
  const records: unknown = parse(text, {
    delimiter: ';',
    quote: '"',
    relax_column_count: true,
  });

  return RowsSchema.parse(records);
};

// An empty line comes back from the tokenizer as a single empty field.
export const isBlankRow = (row: readonly string[]): boolean => {
  return row.length === 0 || (row.length === 1 && row[0] === '');
};

export const toRecord = (fieldnames: readonly string[], row: readonly string[]): Record<string, string> => {
  const record: Record<string, string> = {};

  fieldnames.forEach((name, index) => {
    if (index < row.length) {
      record[name] = row[index];
    }
  });

  return record;
};

export class RowCursor {
  private position = 0;

  constructor(private readonly rows: readonly string[][]) {}

  /** 1-based number of the row returned by the last `next()`. */
  get rowNumber(): number {
    return this.position;
  }

  next(): string[] {
    if (this.position >= this.rows.length) {
      throw new StructuralMismatchError('unexpected end of file', this.position + 1);
    }

    const row = this.rows[this.position];
    this.position += 1;
    return row;
  }

  nextNonBlank(): string[] {
    let row = this.next();

    while (isBlankRow(row)) {
      row = this.next();
    }

    return row;
  }

  rest(): string[][] {
    const remaining = this.rows.slice(this.position);
    this.position = this.rows.length;
    return remaining;
  }
}
