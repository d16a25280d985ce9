export type { AccountType, BankAccount } from './domain/entities/Account.js';
export type { HeaderMetadata } from './domain/entities/HeaderMetadata.js';
export type {
  DerivedFieldName,
  ReferenceField,
  ReferenceFieldMap,
  SepaTag,
} from './domain/entities/ReferenceField.js';
export { sepaTagMarkers, toReferenceFieldMap } from './domain/entities/ReferenceField.js';
export type { Statement } from './domain/entities/Statement.js';
export type { TransactionRecord, TransactionType } from './domain/entities/Transaction.js';
export {
  BankIdentifierError,
  ConfigurationError,
  InvalidFieldError,
  StatementParseError,
  StructuralMismatchError,
} from './domain/errors/StatementErrors.js';
export { parseDefaultSegment } from './domain/services/DefaultSegmentParser.js';
export { parseGermanDecimal } from './domain/services/GermanDecimal.js';
export { removeWrapWhitespace } from './domain/services/ReferenceNormalizer.js';
export { tokenizeReference } from './domain/services/ReferenceTokenizer.js';
export { buildTransactionId } from './domain/services/TransactionHasher.js';
export { classifyTransaction } from './domain/services/TransactionTypeClassifier.js';
export type { BankIdentifierPort, Bic, Iban } from './application/ports/BankIdentifierPort.js';
export type { StatementParserPort } from './application/ports/StatementParserPort.js';
export { GermanBankRegistry, parseBankCodeFile } from './infrastructure/adapters/banking/GermanBankRegistry.js';
export { IbanToolsBankIdentifierAdapter } from './infrastructure/adapters/banking/IbanToolsBankIdentifierAdapter.js';
export { SpardaCsvStatementParser } from './infrastructure/adapters/parser/SpardaCsvStatementParser.js';
export { SpardaBankPlugin, SpardaFileParser, type SpardaBankSettings } from './infrastructure/plugin/SpardaBankPlugin.js';
export { AppContainer } from './infrastructure/bootstrap/AppContainer.js';
export { loadConfig, type AppConfig } from './infrastructure/config/Config.js';
