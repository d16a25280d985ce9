import type { Statement } from '../../domain/entities/Statement.js';

export interface StatementParserPort {
  parse(
    rawStatement: Buffer,
    options?: {
      fileName?: string;
    },
  ): Promise<Statement>;
}
