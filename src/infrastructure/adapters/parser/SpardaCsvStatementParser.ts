import { describeIssues, PENDING_BOOKING_MARKER, TransactionRowSchema } from '../../../application/dto/SpardaRowDTO.js';
import type { BankIdentifierPort, Bic } from '../../../application/ports/BankIdentifierPort.js';
import type { StatementParserPort } from '../../../application/ports/StatementParserPort.js';
import { StatementAssembler } from '../../../application/services/StatementAssembler.js';
import { TransactionAssembler } from '../../../application/services/TransactionAssembler.js';
import type { Statement } from '../../../domain/entities/Statement.js';
import type { TransactionRecord } from '../../../domain/entities/Transaction.js';
import { StructuralMismatchError } from '../../../domain/errors/StatementErrors.js';
import { isBlankRow, readSpardaRows, RowCursor, toRecord } from '../csv/SpardaCsvReader.js';
import { readHeader } from './SpardaHeaderReader.js';

export interface SpardaCsvStatementParserOptions {
  debug?: boolean;
}

export class SpardaCsvStatementParser implements StatementParserPort {
  private readonly transactionAssembler: TransactionAssembler;
  private readonly statementAssembler: StatementAssembler;

  constructor(bankIdentifiers: BankIdentifierPort, bic: Bic, options: SpardaCsvStatementParserOptions = {}) {
    this.transactionAssembler = new TransactionAssembler(bankIdentifiers, { debug: options.debug });
    this.statementAssembler = new StatementAssembler(bankIdentifiers, bic);
  }

  async parse(rawStatement: Buffer, options: { fileName?: string } = {}): Promise<Statement> {
    const statement = this.parseText(rawStatement.toString('latin1'));

    console.log('📄 CSV parsed:', {
      fileName: options.fileName,
      accountId: statement.accountId,
      accountType: statement.accountType,
      transactionsFound: statement.transactions.length,
      period: { start: statement.startDate, end: statement.endDate },
    });

    return statement;
  }

  /** Parses an export that has already been decoded from Latin-1. */
  parseText(text: string): Statement {
    const cursor = new RowCursor(readSpardaRows(text));
    const metadata = readHeader(cursor);
    const fieldnames = cursor.next();
    const firstDataRow = cursor.rowNumber + 1;

    const transactions: TransactionRecord[] = [];

    cursor.rest().forEach((row, index) => {
      if (isBlankRow(row)) {
        return;
      }

      const record = toRecord(fieldnames, row);

      if (record.Buchungstag === PENDING_BOOKING_MARKER) {
        return;
      }

      const parsed = TransactionRowSchema.safeParse(record);

      if (!parsed.success) {
        throw new StructuralMismatchError(describeIssues(parsed.error), firstDataRow + index);
      }

      transactions.push(this.transactionAssembler.assemble(parsed.data));
    });

    return this.statementAssembler.assemble(metadata, transactions);
  }
}
