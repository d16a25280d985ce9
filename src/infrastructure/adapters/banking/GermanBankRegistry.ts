import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { ConfigurationError } from '../../../domain/errors/StatementErrors.js';

const BankRegistryEntrySchema = z.object({
  bankCode: z.string().regex(/^\d{8}$/),
  bic: z.string().regex(/^[A-Z0-9]{8}([A-Z0-9]{3})?$/),
  name: z.string(),
});

const BankRegistrySchema = z.object({
  banks: z.array(BankRegistryEntrySchema),
});

export type BankRegistryEntry = z.infer<typeof BankRegistryEntrySchema>;

export const defaultRegistryPath = fileURLToPath(new URL('../../../../data/german-bank-registry.json', import.meta.url));

// Column layout of the Bundesbank "Bankleitzahlendatei" (fixed width, Latin-1).
const blzColumns = {
  bankCode: [0, 8],
  name: [9, 67],
  bic: [139, 150],
} as const;

const column = (line: string, [start, end]: readonly [number, number]): string => line.slice(start, end).trim();

/**
 * Reads the Bundesbank bank code file. Records without a BIC (mostly branch
 * offices sharing their head office's code) are left out.
 */
export const parseBankCodeFile = (text: string, source = 'bank code file'): BankRegistryEntry[] => {
  const entries: BankRegistryEntry[] = [];

  text.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim() || !column(line, blzColumns.bic)) {
      return;
    }

    const parsed = BankRegistryEntrySchema.safeParse({
      bankCode: column(line, blzColumns.bankCode),
      bic: column(line, blzColumns.bic),
      name: column(line, blzColumns.name),
    });

    if (!parsed.success) {
      throw new ConfigurationError(`Malformed record in ${source} at line ${index + 1}: ${parsed.error.message}`);
    }

    entries.push(parsed.data);
  });

  return entries;
};

// BICs without a branch part address the head office, same as XXX.
const primaryBic = (bic: string): string => (bic.length === 8 ? `${bic}XXX` : bic);

/** Maps German bank codes (BLZ) to BICs and back. */
export class GermanBankRegistry {
  private readonly byBankCode = new Map<string, BankRegistryEntry>();
  private readonly byBic = new Map<string, BankRegistryEntry>();

  constructor(entries: BankRegistryEntry[]) {
    // First entry wins for bank codes listed twice and for BICs shared by several bank codes.
    for (const entry of entries) {
      if (!this.byBankCode.has(entry.bankCode)) {
        this.byBankCode.set(entry.bankCode, entry);
      }

      if (!this.byBic.has(primaryBic(entry.bic))) {
        this.byBic.set(primaryBic(entry.bic), entry);
      }
    }
  }

  /**
   * Loads a registry from the bundled JSON layout, or from the Bundesbank
   * bank code file when the path does not end in `.json`.
   */
  static fromFile(filePath: string = defaultRegistryPath): GermanBankRegistry {
    let raw: Buffer;

    try {
      raw = readFileSync(filePath);
    } catch (error) {
      throw new ConfigurationError(
        `Unable to read bank registry ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }

    if (!filePath.toLowerCase().endsWith('.json')) {
      return new GermanBankRegistry(parseBankCodeFile(raw.toString('latin1'), filePath));
    }

    let json: unknown;

    try {
      json = JSON.parse(raw.toString('utf8'));
    } catch (error) {
      throw new ConfigurationError(
        `Malformed bank registry ${filePath}: ${error instanceof Error ? error.message : 'Unknown error'}`,
      );
    }

    const parsed = BankRegistrySchema.safeParse(json);

    if (!parsed.success) {
      throw new ConfigurationError(`Malformed bank registry ${filePath}: ${parsed.error.message}`);
    }

    return new GermanBankRegistry(parsed.data.banks);
  }

  findByBankCode(bankCode: string): BankRegistryEntry | undefined {
    return this.byBankCode.get(bankCode);
  }

  findByBic(bic: string): BankRegistryEntry | undefined {
    return this.byBic.get(primaryBic(bic.toUpperCase()));
  }
}
