/**
 * Input schemas for the array-style facade API.
 *
 * Only the shape of IBAN/BIC is checked here; checksums are the caller's
 * concern. Code values (priority, service level, ...) are passed through as
 * strings and gated by the PaymentInformation setters.
 */

import { z } from "zod";

const ibanSchema = z
  .string()
  .transform((value) => value.replace(/\s/g, "").toUpperCase())
  .pipe(z.string().regex(/^[A-Z]{2}\d{2}[A-Z0-9]{11,30}$/, "Invalid IBAN format"));

const bicSchema = z
  .string()
  .transform((value) => value.replace(/\s/g, "").toUpperCase())
  .pipe(z.string().regex(/^[A-Z]{6}[A-Z0-9]{2}([A-Z0-9]{3})?$/, "Invalid BIC format"));

const currencySchema = z
  .string()
  .regex(/^[A-Za-z]{3}$/, "Invalid currency code")
  .transform((value) => value.toUpperCase());

/** Decimal string ("12.50") or integer cents */
const amountSchema = z.union([z.string().min(1), z.number().int().nonnegative()]);

const paymentInfoBaseSchema = z.object({
  id: z.string().min(1).max(35),
  dueDate: z.coerce.date().optional(),
  batchBooking: z.boolean().optional(),
  serviceLevel: z.string().optional(),
  localInstrumentCode: z.string().optional(),
  categoryPurposeCode: z.string().optional(),
  country: z.string().length(2).optional(),
  bankPartyIdentification: z.string().min(1).optional(),
  bankPartyIdentificationScheme: z.string().min(1).max(4).optional(),
  hideOriginAccountIBAN: z.boolean().optional(),
  hideGeneralSettings: z.boolean().optional(),
});

export const creditPaymentInfoSchema = paymentInfoBaseSchema.extend({
  debtorName: z.string().min(1).max(70),
  debtorAccountIBAN: ibanSchema,
  debtorAgentBIC: bicSchema.optional(),
  debtorAccountCurrency: currencySchema.optional(),
  instructionPriority: z.string().optional(),
});

export const debitPaymentInfoSchema = paymentInfoBaseSchema.extend({
  creditorName: z.string().min(1).max(70),
  creditorAccountIBAN: ibanSchema,
  creditorAgentBIC: bicSchema.optional(),
  creditorAccountCurrency: currencySchema.optional(),
  creditorId: z.string().min(1).max(35),
  seqType: z.string().min(1),
  mandateSignDate: z.coerce.date().optional(),
});

const transferBaseSchema = z.object({
  amount: amountSchema,
  currency: currencySchema.optional(),
  endToEndId: z.string().min(1).max(35).optional(),
  instructionId: z.string().min(1).max(35).optional(),
  remittanceInformation: z.string().max(140).optional(),
  creditorReference: z.string().min(1).max(35).optional(),
  country: z.string().length(2).optional(),
  postalAddress: z.array(z.string()).max(2).optional(),
});

export const creditTransferSchema = transferBaseSchema.extend({
  creditorName: z.string().min(1).max(70),
  creditorIBAN: ibanSchema,
  creditorBIC: bicSchema.optional(),
  purposeCode: z.string().length(4).optional(),
  ultimateCreditorName: z.string().min(1).max(70).optional(),
});

export const directDebitSchema = transferBaseSchema.extend({
  debtorName: z.string().min(1).max(70),
  debtorIBAN: ibanSchema,
  debtorBIC: bicSchema.optional(),
  debtorMandate: z.string().min(1).max(35),
  debtorMandateSignDate: z.coerce.date().optional(),
  originalMandateId: z.string().min(1).max(35).optional(),
  originalDebtorIBAN: ibanSchema.optional(),
  amendedDebtorAccount: z.boolean().optional(),
});

export type CreditPaymentInfoInput = z.input<typeof creditPaymentInfoSchema>;
export type DebitPaymentInfoInput = z.input<typeof debitPaymentInfoSchema>;
export type CreditTransferInput = z.input<typeof creditTransferSchema>;
export type DirectDebitInput = z.input<typeof directDebitSchema>;
