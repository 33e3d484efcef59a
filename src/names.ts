/**
 * Word-form conversion used when matching names such as `Order` against an
 * entity set called `Orders`. Supplied by the caller; no default ships.
 */
export interface Pluralizer {
  pluralize(word: string): string;
  singularize(word: string): string;
}

export type NameMatcher = (actualName: string, requestedName: string) => boolean;

function homogenize(name: string): string {
  return name.replace(/[^\p{L}\p{N}]/gu, '').toLowerCase();
}

/**
 * Compare a declared name with a caller-supplied one ignoring case and
 * non-alphanumeric characters, and singular/plural forms when a pluralizer
 * is given.
 */
export function namesAreEqual(
  actualName: string,
  requestedName: string,
  pluralizer?: Pluralizer
): boolean {
  const actual = homogenize(actualName);
  const requested = homogenize(requestedName);
  if (actual === requested) return true;
  if (!pluralizer) return false;
  return (
    homogenize(pluralizer.singularize(actualName)) === homogenize(pluralizer.singularize(requestedName)) ||
    homogenize(pluralizer.pluralize(actualName)) === homogenize(pluralizer.pluralize(requestedName))
  );
}

export function createNameMatcher(pluralizer?: Pluralizer): NameMatcher {
  return (actualName, requestedName) => namesAreEqual(actualName, requestedName, pluralizer);
}
