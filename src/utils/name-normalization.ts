/**
 * Person-name cleanup applied before names are stored in the analytics schema
 */

/**
 * Trim, collapse internal whitespace runs to one space and uppercase.
 * Null stays null. Idempotent.
 */
export function normalizePersonName(raw: string | null): string | null {
  if (raw === null) {
    return null;
  }

  return raw.trim().replace(/\s+/g, ' ').toUpperCase();
}

/**
 * First space-delimited token of an already normalized name, or '' when there is none
 */
export function firstToken(normalizedName: string | null): string {
  if (!normalizedName) {
    return '';
  }
  return normalizedName.split(' ')[0];
}
