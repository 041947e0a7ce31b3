/**
 * Reduce free text to the SEPA Latin character set:
 * a-z A-Z 0-9 / - ? : ( ) . , ' + and space.
 */

const TRANSLITERATIONS: Record<string, string> = {
  "Ä": "Ae",
  "Ö": "Oe",
  "Ü": "Ue",
  "ä": "ae",
  "ö": "oe",
  "ü": "ue",
  "ß": "ss",
  "Æ": "AE",
  "æ": "ae",
  "Ø": "O",
  "ø": "o",
  "&": "+",
};

const TRANSLITERATION_PATTERN = new RegExp(`[${Object.keys(TRANSLITERATIONS).join("")}]`, "g");
const COMBINING_MARKS = /[\u0300-\u036f]/g;
const DISALLOWED = /[^A-Za-z0-9/\-?:().,'+ ]/g;

export function sanitizeString(raw: string): string {
  return raw
    .replace(TRANSLITERATION_PATTERN, (char) => TRANSLITERATIONS[char] ?? "")
    .normalize("NFD")
    .replace(COMBINING_MARKS, "")
    .replace(/\s+/g, " ")
    .replace(DISALLOWED, "")
    .replace(/ {2,}/g, " ")
    .trim();
}
