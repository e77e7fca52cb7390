/**
 * Identifier model shared by pre-release handling on both sides of the
 * translator.
 *
 * An identifier is either a plain number or an alphanumeric token. Numeric
 * values are unsigned 64-bit integers, held as bigint.
 */

export type Identifier =
  | { readonly kind: 'numeric'; readonly value: bigint }
  | { readonly kind: 'alphanumeric'; readonly value: string };

export const MAX_NUMERIC_IDENTIFIER = 18_446_744_073_709_551_615n;

export function numeric(value: number | bigint): Identifier {
  return { kind: 'numeric', value: BigInt(value) };
}

/**
 * Read a run of ASCII digits as a numeric identifier value.
 * Returns undefined when the text is not all digits or exceeds 64 bits.
 */
export function parseNumericValue(digits: string): bigint | undefined {
  if (!/^[0-9]+$/.test(digits)) return undefined;
  const value = BigInt(digits);
  return value <= MAX_NUMERIC_IDENTIFIER ? value : undefined;
}

export function alphanumeric(value: string): Identifier {
  return { kind: 'alphanumeric', value };
}

/** Marker inserted in front of a bare numeric pre-release. */
export const UNSTABLE_MARKER = 'unstable';

export function isUnstableMarker(identifier: Identifier | undefined): boolean {
  return identifier?.kind === 'alphanumeric' && identifier.value === UNSTABLE_MARKER;
}

export function identifierEquals(a: Identifier, b: Identifier): boolean {
  return a.kind === b.kind && a.value === b.value;
}

/**
 * Numeric identifiers sort by value and before any alphanumeric one;
 * alphanumeric identifiers sort by code unit.
 */
export function compareIdentifiers(a: Identifier, b: Identifier): number {
  switch (a.kind) {
    case 'numeric':
      if (b.kind === 'alphanumeric') return -1;
      if (a.value === b.value) return 0;
      return a.value < b.value ? -1 : 1;
    case 'alphanumeric':
      if (b.kind === 'numeric') return 1;
      if (a.value === b.value) return 0;
      return a.value < b.value ? -1 : 1;
  }
}

/**
 * Compare two pre-release lists. Element-wise first; on a shared prefix the
 * shorter list wins, except that an empty list (a release) sorts after
 * any pre-release.
 */
export function compareIdentifierLists(
  a: readonly Identifier[],
  b: readonly Identifier[],
): number {
  if (a.length === 0 && b.length === 0) return 0;
  if (a.length === 0) return 1;
  if (b.length === 0) return -1;

  const shared = Math.min(a.length, b.length);
  for (let i = 0; i < shared; i++) {
    const left = a[i];
    const right = b[i];
    if (left === undefined || right === undefined) break;
    const cmp = compareIdentifiers(left, right);
    if (cmp !== 0) return cmp;
  }

  return Math.sign(a.length - b.length);
}

export function identifierToString(identifier: Identifier): string {
  return identifier.kind === 'numeric' ? String(identifier.value) : identifier.value;
}

/** Zero-pad a numeric value to the four digits Chocolatey sorts on. */
export function padNumeric(value: bigint): string {
  return String(value).padStart(4, '0');
}
