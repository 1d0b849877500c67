/**
 * Field names as query identifiers
 */

/** The name bound to the whole current record */
export const RECORD_ALIAS = "_";

/**
 * Turn a record key into an identifier: every run of characters that
 * cannot appear in an identifier becomes "_", and a name that cannot
 * start one (a leading digit) gets a "_" prefix. Letters outside ASCII
 * are kept.
 *
 * @example
 * sanitizeName("first name") // "first_name"
 * sanitizeName("2nd")        // "_2nd"
 * sanitizeName("café")       // "café"
 */
export function sanitizeName(key: string): string {
  const name = key.replace(/\P{ID_Continue}+/gu, "_");
  if (name === "") return "_";
  return /^[\p{ID_Start}_]/u.test(name) ? name : `_${name}`;
}
