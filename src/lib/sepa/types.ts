/**
 * SEPA code lists shared by the payment model and the DOM builders.
 */

// ============================================================================
// CODE LISTS
// ============================================================================

export const LOCAL_INSTRUMENT_CODES = ["B2B", "CORE", "COR1", "IN", "ONCL"] as const;
export type LocalInstrumentCode = (typeof LOCAL_INSTRUMENT_CODES)[number];

export const INSTRUCTION_PRIORITIES = ["NORM", "HIGH"] as const;
export type InstructionPriority = (typeof INSTRUCTION_PRIORITIES)[number];

export const SERVICE_LEVELS = ["SEPA", "NURG"] as const;
export type ServiceLevel = (typeof SERVICE_LEVELS)[number];

export const SCHEMA_NAMES = ["IBAN", "BBAN"] as const;
export type SchemaName = (typeof SCHEMA_NAMES)[number];

/**
 * Mandate sequence types for recurring direct debits:
 * FRST = first of a series, RCUR = subsequent, OOFF = one-off, FNAL = last.
 */
export const SEQUENCE_TYPES = ["FRST", "RCUR", "OOFF", "FNAL"] as const;
export type SequenceType = (typeof SEQUENCE_TYPES)[number];

export const PAYMENT_METHOD_CREDIT_TRANSFER = "TRF";
export const PAYMENT_METHOD_DIRECT_DEBIT = "DD";

export const PAIN_FORMAT_CREDIT_TRANSFER = "pain.001.001.03";
export const PAIN_FORMAT_DIRECT_DEBIT = "pain.008.001.02";

// ============================================================================
// HELPERS
// ============================================================================

/**
 * Narrow an arbitrary string to a member of a closed code list
 */
export function isOneOf<T extends string>(list: readonly T[], value: string): value is T {
  return list.some((item) => item === value);
}
