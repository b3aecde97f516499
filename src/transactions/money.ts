/**
 * Amounts travel through the pipeline as whole cents; the store holds
 * DECIMAL(10,2).
 */

/** Largest amount a DECIMAL(10,2) column holds: 99,999,999.99. */
export const MAX_CENTS = 9_999_999_999;

const DECIMAL_TEXT = /^([-+]?)(\d*)(?:\.(\d*))?$/;

/**
 * Round a plain decimal string to whole cents from its digits, half away from
 * zero. Null when the text is not a plain decimal. Digit runs too long for a
 * double come back as `Infinity`.
 */
export function decimalTextToCents(text: string): number | null {
  const match = DECIMAL_TEXT.exec(text);
  if (match === null) return null;
  const [, sign, whole, frac = ""] = match;
  if (whole === "" && frac === "") return null;

  const digits = frac.padEnd(3, "0");
  let cents = Number(whole || "0") * 100 + Number(digits.slice(0, 2));
  if (digits.charAt(2) >= "5") cents += 1;
  return sign === "-" && cents !== 0 ? -cents : cents;
}

/** `1.005` → `101`; numbers in exponent form fall back to float rounding. */
export function toCents(amount: number): number {
  return decimalTextToCents(String(amount)) ?? Math.round(amount * 100);
}

/** `4999` → `"49.99"`, `-100` → `"-1.00"`. */
export function centsToDecimal(cents: number): string {
  const sign = cents < 0 ? "-" : "";
  const abs = Math.abs(cents);
  return `${sign}${Math.trunc(abs / 100)}.${String(abs % 100).padStart(2, "0")}`;
}

/** Read a DECIMAL column back; drivers return numbers or strings. */
export function decimalToNumber(value: unknown): number {
  if (typeof value === "number") return value;
  if (typeof value === "string" || typeof value === "bigint") return Number(value);
  return 0;
}
