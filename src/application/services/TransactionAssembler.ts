import type { BankAccount } from '../../domain/entities/Account.js';
import { toReferenceFieldMap, type ReferenceFieldMap } from '../../domain/entities/ReferenceField.js';
import type { TransactionRecord } from '../../domain/entities/Transaction.js';
import { BankIdentifierError } from '../../domain/errors/StatementErrors.js';
import { DATETIME_FORMAT, parseBerlinDate, toCompactDate } from '../../domain/services/BerlinDates.js';
import { parseGermanDecimal } from '../../domain/services/GermanDecimal.js';
import { removeWrapWhitespace } from '../../domain/services/ReferenceNormalizer.js';
import { tokenizeReference } from '../../domain/services/ReferenceTokenizer.js';
import { buildTransactionId } from '../../domain/services/TransactionHasher.js';
import { classifyTransaction } from '../../domain/services/TransactionTypeClassifier.js';
import type { TransactionRowDTO } from '../dto/SpardaRowDTO.js';
import type { BankIdentifierPort, Bic, Iban } from '../ports/BankIdentifierPort.js';

export interface TransactionAssemblerOptions {
  debug?: boolean;
}

const stripSpaces = (value: string): string => value.replace(/ /g, '');

export class TransactionAssembler {
  constructor(
    private readonly bankIdentifiers: BankIdentifierPort,
    private readonly options: TransactionAssemblerOptions = {},
  ) {}

  assemble(row: TransactionRowDTO): TransactionRecord {
    const reference = removeWrapWhitespace(row.Verwendungszweck);
    const amount = parseGermanDecimal(row.Umsatz);
    const currency = row.Währung;

    const id = buildTransactionId({
      valueDate: toCompactDate(row.Wertstellungstag),
      memo: reference,
      amount,
      currency,
    });

    const referenceFields = tokenizeReference(reference);
    const fields = toReferenceFieldMap(referenceFields);

    if (this.options.debug) {
      console.log('🔎 Parsed fields from reference:', fields);
    }

    return {
      id,
      bookingDate: row.Buchungstag,
      valueDate: row.Wertstellungstag,
      date: row.Wertstellungstag,
      userDate: this.resolveCardPaymentDate(fields) ?? row.Wertstellungstag,
      memo: fields.sepa.REF || fields.derived.card_payment_reference || reference,
      amount,
      currency,
      type: classifyTransaction(fields.derived.type, amount),
      bankAccountTo: this.resolveBankAccount(fields),
      endToEndReference: fields.sepa.END_TO_END_REF || undefined,
      payee: fields.derived.recipient || undefined,
      referenceFields,
    };
  }

  private resolveBankAccount(fields: ReferenceFieldMap): BankAccount | undefined {
    const ibanValue = fields.sepa.IBAN ? stripSpaces(fields.sepa.IBAN) : '';

    if (!ibanValue) {
      return undefined;
    }

    const iban = this.tryParse(() => this.bankIdentifiers.parseIban(ibanValue));

    if (!iban) {
      return undefined;
    }

    const bicValue = fields.sepa.BIC ? stripSpaces(fields.sepa.BIC) : '';
    const bic = (bicValue ? this.tryParse(() => this.bankIdentifiers.parseBic(bicValue)) : undefined) ?? this.bankIdentifiers.bicForIban(iban);

    if (!bic) {
      return undefined;
    }

    return {
      bankId: bic.value,
      accountId: iban.value,
      ...(bic.branchCode ? { branchId: bic.branchCode } : {}),
    };
  }

  private tryParse<T extends Iban | Bic>(parse: () => T): T | undefined {
    try {
      return parse();
    } catch (error) {
      if (error instanceof BankIdentifierError) {
        console.warn(`⚠️ Failed to parse ${error.kind} from ${JSON.stringify(error.rawValue)}: ${error.message}`);
        return undefined;
      }

      throw error;
    }
  }

  private resolveCardPaymentDate(fields: ReferenceFieldMap): string | undefined {
    const value = fields.derived.card_payment_datetime;

    if (!value) {
      return undefined;
    }

    const parsed = parseBerlinDate(value, DATETIME_FORMAT);

    if (parsed === null) {
      console.warn(`⚠️ Failed to parse card payment datetime from ${JSON.stringify(value)}`);
      return undefined;
    }

    return parsed;
  }
}
