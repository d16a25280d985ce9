import { readFile } from 'node:fs/promises';
import path from 'node:path';
import type { BankIdentifierPort, Bic } from '../../application/ports/BankIdentifierPort.js';
import type { Statement } from '../../domain/entities/Statement.js';
import { BankIdentifierError, ConfigurationError } from '../../domain/errors/StatementErrors.js';
import { SpardaCsvStatementParser } from '../adapters/parser/SpardaCsvStatementParser.js';

export interface SpardaBankSettings {
  bic?: string;
  debug?: boolean;
}

/** Parses one export file, exactly once. */
export class SpardaFileParser {
  private consumed = false;

  constructor(
    readonly filePath: string,
    private readonly parser: SpardaCsvStatementParser,
  ) {}

  async parse(): Promise<Statement> {
    if (this.consumed) {
      throw new Error(`${this.filePath} was already parsed, create a new parser to parse it again`);
    }

    this.consumed = true;
    const rawStatement = await readFile(this.filePath);
    return this.parser.parse(rawStatement, { fileName: path.basename(this.filePath) });
  }
}

/** Plugin for parsing CSV exports of the German Sparda-Bank eG. */
export class SpardaBankPlugin {
  constructor(
    private readonly bankIdentifiers: BankIdentifierPort,
    readonly settings: SpardaBankSettings = {},
  ) {}

  isConfigured(): boolean {
    return Boolean(this.settings.bic);
  }

  getParser(filePath: string): SpardaFileParser {
    return new SpardaFileParser(filePath, this.createStatementParser());
  }

  createStatementParser(): SpardaCsvStatementParser {
    return new SpardaCsvStatementParser(this.bankIdentifiers, this.resolveBic(), { debug: this.settings.debug });
  }

  private resolveBic(): Bic {
    const value = this.settings.bic?.trim();

    if (!value) {
      throw new ConfigurationError("Please configure your bank's `bic` in the settings.");
    }

    if (value.length !== 8 && value.length !== 11) {
      throw new ConfigurationError(`The configured bic ${JSON.stringify(value)} must have 8 or 11 characters.`);
    }

    try {
      return this.bankIdentifiers.parseBic(value);
    } catch (error) {
      if (error instanceof BankIdentifierError) {
        throw new ConfigurationError(`The configured bic ${JSON.stringify(value)} is not a valid BIC.`);
      }

      throw error;
    }
  }
}
