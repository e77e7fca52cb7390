/**
 * Semantic version side of the translator. Parsing and precedence come from
 * the `semver` package; this module only adapts its values to the shared
 * identifier model and renders them with their build metadata.
 */

import semver from 'semver';
import type { SemVer } from 'semver';
import { VersionParseError } from '../errors/version-error.js';
import { alphanumeric, numeric, parseNumericValue, type Identifier } from './identifier.js';

/**
 * Parse a strict SemVer 2.0 string.
 *
 * The `semver` package tolerates a leading `v` and surrounding whitespace;
 * neither is part of the grammar, so both are rejected here.
 *
 * @throws VersionParseError with kind `SemverParseFailure`
 */
export function parseSemVer(text: string): SemVer {
  if (text.length === 0) {
    throw new VersionParseError('EmptyInput', text);
  }
  if (text !== text.trim() || text.startsWith('v')) {
    throw new VersionParseError('SemverParseFailure', text);
  }

  const parsed = semver.parse(text);
  if (!parsed) {
    throw new VersionParseError('SemverParseFailure', text);
  }
  return parsed;
}

/** Like `parseSemVer`, but returns null instead of throwing. */
export function tryParseSemVer(text: string): SemVer | null {
  try {
    return parseSemVer(text);
  } catch (err) {
    if (err instanceof VersionParseError) return null;
    throw err;
  }
}

/**
 * Render a semantic version including its build metadata
 * (`SemVer#format()` leaves the metadata out).
 */
export function formatSemVer(version: SemVer): string {
  return version.build.length > 0 ? `${version.version}+${version.build.join('.')}` : version.version;
}

/**
 * Map pre-release identifiers onto the shared model. `semver` hands back
 * numbers past Number.MAX_SAFE_INTEGER as strings; those are still numeric.
 */
export function semverPrerelease(version: SemVer): Identifier[] {
  return version.prerelease.map((id) => {
    if (typeof id === 'number') return numeric(id);
    const value = parseNumericValue(id);
    return value === undefined ? alphanumeric(id) : numeric(value);
  });
}
