const DECIMAL_PATTERN = /^(\d+\.?\d*|\.\d+)$/;

/**
 * Strict decimal parse for keypad text. Accepts "12", "12.", "12.5" and ".5";
 * rejects "", "." and anything with a sign, exponent or second point, which
 * `Number()` alone would either accept or coerce to 0.
 */
export function parseAmount(text: string): number | undefined {
  if (!DECIMAL_PATTERN.test(text)) return undefined;
  return Number(text);
}
