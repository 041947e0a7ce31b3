/**
 * Money is handled as integer minor units (cents) throughout.
 * Neither function below goes through floating point.
 */

import { InvalidArgumentError } from "../errors";

const DECIMAL_AMOUNT = /^(\d+)(?:[.,](\d{1,2}))?$/;

/**
 * Parse "12.5", "12,50" or 1250-style input into integer cents.
 * Numbers are taken as cents already and must be non-negative safe integers.
 */
export function parseAmountToCents(value: string | number, field = "amount"): number {
  if (typeof value === "number") {
    if (!Number.isSafeInteger(value) || value < 0) {
      throw new InvalidArgumentError(`Invalid amount in cents: ${value}`, field);
    }
    return value;
  }

  const match = DECIMAL_AMOUNT.exec(value.trim());
  if (!match) {
    throw new InvalidArgumentError(`Invalid amount: "${value}"`, field);
  }

  const units = Number(match[1]);
  const fraction = Number((match[2] ?? "").padEnd(2, "0"));
  const cents = units * 100 + fraction;

  if (!Number.isSafeInteger(cents)) {
    throw new InvalidArgumentError(`Amount out of range: "${value}"`, field);
  }
  return cents;
}

/**
 * Format integer cents as an XML decimal, e.g. 123456 → "1234.56"
 */
export function intToCurrency(cents: number): string {
  const sign = cents < 0 ? "-" : "";
  const abs = Math.abs(cents);
  const units = Math.floor(abs / 100);
  const fraction = String(abs % 100).padStart(2, "0");
  return `${sign}${units}.${fraction}`;
}
