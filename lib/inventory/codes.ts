/**
 * Short product codes for ready products: one digit then two letters,
 * e.g. `1CM`. The letters come from the item category and the name; the
 * digit is picked to avoid codes already in use.
 */

import { CodeSpaceExhaustedError, ValidationError } from "@/lib/errors";

export const CODE_PATTERN = /^[1-9][A-Z]{2}$/;

const DIGITS = [1, 2, 3, 4, 5, 6, 7, 8, 9];
const ALPHABET = "ABCDEFGHIJKLMNOPQRSTUVWXYZ";

/** First character, uppercased; anything outside A-Z becomes X. */
function codeLetter(source: string): string {
  const ch = source.trim().charAt(0).toUpperCase();
  return ALPHABET.includes(ch) && ch !== "" ? ch : "X";
}

/**
 * Pick an unused code for a product.
 *
 * Tries `<1-9><category letter><name letter>` first. When all nine are
 * taken, the name letter is swapped for A, B, C... in turn. That search stops
 * after Z and throws rather than looping forever.
 */
export function assignCode(
  name: string,
  itemCategory: string,
  existingCodes: Iterable<string>,
): string {
  const used = new Set<string>();
  for (const code of existingCodes) used.add(code.trim().toUpperCase());

  const l2 = codeLetter(itemCategory.trim() || name);
  const l3 = codeLetter(name);

  for (const d of DIGITS) {
    const code = `${d}${l2}${l3}`;
    if (!used.has(code)) return code;
  }

  for (const extra of ALPHABET) {
    for (const d of DIGITS) {
      const code = `${d}${l2}${extra}`;
      if (!used.has(code)) return code;
    }
  }

  throw new CodeSpaceExhaustedError(l2);
}

/**
 * Normalize a user-supplied code (trim, uppercase). Returns "" for a blank
 * code; throws for anything that isn't digit + two letters.
 */
export function normalizeCode(raw: string): string {
  const code = raw.trim().toUpperCase();
  if (code === "") return "";
  if (!CODE_PATTERN.test(code)) {
    throw new ValidationError(
      "code must be exactly 3 chars: 1 digit (1-9) + 2 letters (e.g. 1CM, 5CB)",
      "code",
    );
  }
  return code;
}

/** Throw if `code` is already held by a product other than `exceptId`. */
export function ensureCodeAvailable(
  code: string,
  products: readonly { id: string; code: string }[],
  exceptId?: string,
): void {
  const taken = products.some(
    (p) => p.id !== exceptId && p.code.trim().toUpperCase() === code,
  );
  if (taken) {
    throw new ValidationError(`code '${code}' already exists`, "code");
  }
}
