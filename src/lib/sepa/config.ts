/**
 * SEPA defaults read from the environment
 *
 * SEPA_DEFAULT_CURRENCY  ISO 4217 code for new payment blocks (default EUR)
 * SEPA_DUE_DATE_FORMAT   date-fns pattern for ReqdExctnDt / ReqdColltnDt (default yyyy-MM-dd)
 * SEPA_BATCH_BOOKING     "true" | "false"; unset leaves BtchBookg out
 */

import { z } from "zod";
import { InvalidArgumentError } from "./errors";
import { isDueDateFormat } from "./util/date-format";

const envSchema = z.object({
  SEPA_DEFAULT_CURRENCY: z
    .string()
    .trim()
    .regex(/^[A-Z]{3}$/, "must be a three-letter ISO 4217 code")
    .default("EUR"),
  SEPA_DUE_DATE_FORMAT: z
    .string()
    .trim()
    .min(1)
    .refine(isDueDateFormat, "must be a date-fns pattern with year, month and day (e.g. yyyy-MM-dd)")
    .default("yyyy-MM-dd"),
  SEPA_BATCH_BOOKING: z
    .enum(["true", "false"])
    .optional()
    .transform((value) => (value === undefined ? null : value === "true")),
});

export interface SepaConfig {
  defaultCurrency: string;
  dueDateFormat: string;
  batchBooking: boolean | null;
}

let cachedConfig: SepaConfig | null = null;

export function getSepaConfig(env: NodeJS.ProcessEnv = process.env): SepaConfig {
  if (cachedConfig) return cachedConfig;

  const parsed = envSchema.safeParse({
    SEPA_DEFAULT_CURRENCY: env.SEPA_DEFAULT_CURRENCY || undefined,
    SEPA_DUE_DATE_FORMAT: env.SEPA_DUE_DATE_FORMAT || undefined,
    SEPA_BATCH_BOOKING: env.SEPA_BATCH_BOOKING || undefined,
  });

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = String(issue?.path[0] ?? "environment");
    throw new InvalidArgumentError(
      `Invalid SEPA configuration: ${variable} ${issue?.message ?? "is invalid"}`,
      variable
    );
  }

  cachedConfig = {
    defaultCurrency: parsed.data.SEPA_DEFAULT_CURRENCY,
    dueDateFormat: parsed.data.SEPA_DUE_DATE_FORMAT,
    batchBooking: parsed.data.SEPA_BATCH_BOOKING,
  };
  return cachedConfig;
}

export function resetSepaConfig(): void {
  cachedConfig = null;
}
