import { format, isValid, parse } from "date-fns";

const SAMPLE_DATE = new Date(2001, 1, 23);
const REFERENCE_DATE = new Date(1999, 5, 15, 12, 30);

/**
 * A due date pattern is usable when date-fns renders it without error and the
 * rendered text reads back as the same calendar day. Rejects token mix-ups
 * such as `YYYY-MM-DD` (week year, day of year) or `Y-m-d` (m = minutes).
 */
export function isDueDateFormat(pattern: string): boolean {
  let rendered: string;
  try {
    rendered = format(SAMPLE_DATE, pattern);
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }

  let parsed: Date;
  try {
    parsed = parse(rendered, pattern, REFERENCE_DATE);
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }

  return isValid(parsed) && parsed.getTime() === SAMPLE_DATE.getTime();
}
