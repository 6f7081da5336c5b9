/**
 * Vendor prefixes removed from customer and party identifiers, in the order
 * they are stripped. `H-CIT-` must go before `H-` and `CIT-`.
 */
export const IDENTIFIER_PREFIXES = ['H-CIT-', 'H-', 'CIT-'] as const;

function stripOnce(value: string): string {
  let result = value.trim().toUpperCase();
  for (const prefix of IDENTIFIER_PREFIXES) {
    result = result.replaceAll(prefix, '');
  }
  return result.trim();
}

/**
 * Canonical form of an account or party identifier, used as the join key
 * between the activity log and the contacts table.
 *
 * Prefixes are removed wherever they occur in the value, not only at the start.
 * The strip pass repeats until the value stops changing, so that a removal
 * which brings two halves of a prefix together cannot leave a second prefix
 * behind.
 */
export function normalizeIdentifier(raw: string | number | null | undefined): string | null {
  if (raw === null || raw === undefined) return null;

  let current = String(raw);
  let next = stripOnce(current);
  while (next !== current) {
    current = next;
    next = stripOnce(current);
  }
  return next;
}
