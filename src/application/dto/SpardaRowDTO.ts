import { z } from 'zod';
import { parseBerlinDate } from '../../domain/services/BerlinDates.js';

const berlinDate = z.string().transform((value, ctx) => {
  const parsed = parseBerlinDate(value);

  if (parsed === null) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected DD.MM.YYYY, got ${JSON.stringify(value)}` });
    return z.NEVER;
  }

  return parsed;
});

export const HeaderSummarySchema = z.object({
  'Umsätze ab': berlinDate,
  Enddatum: berlinDate,
  Kontonummer: z.string(),
  Saldo: z.string(),
  Währung: z.string(),
});

export type HeaderSummaryDTO = z.infer<typeof HeaderSummarySchema>;

export const TransactionRowSchema = z.object({
  Buchungstag: berlinDate,
  Wertstellungstag: berlinDate,
  Verwendungszweck: z.string(),
  Umsatz: z.string(),
  Währung: z.string(),
});

export type TransactionRowDTO = z.infer<typeof TransactionRowSchema>;

export const PENDING_BOOKING_MARKER = '* noch nicht ausgeführte Umsätze';

export const describeIssues = (error: z.ZodError): string => {
  return error.issues.map((issue) => `${issue.path.join('.') || 'row'}: ${issue.message}`).join('; ');
};
