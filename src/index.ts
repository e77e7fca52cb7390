/**
 * choco-version — translate between Chocolatey package versions and
 * semantic versions.
 *
 * Chocolatey versions have up to four numeric parts and a pre-release that
 * is compared as plain text; semantic versions have three parts, dotted
 * pre-release identifiers and build metadata. This package parses both,
 * converts each into the other, and stamps date-based fix versions.
 */

// ---------------------------------------------------------------------------
// Version
// ---------------------------------------------------------------------------

export const VERSION = '0.1.0';

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

export {
  ChocoVersion,
  FIX_VERSION_THRESHOLD,
  MAX_BUILD,
  MAX_VERSION_PART,
  type ChocoEqualityOptions,
} from './version/choco-version.js';
export {
  alphanumeric,
  compareIdentifierLists,
  compareIdentifiers,
  identifierEquals,
  MAX_NUMERIC_IDENTIFIER,
  numeric,
  parseNumericValue,
  UNSTABLE_MARKER,
  type Identifier,
} from './version/identifier.js';
export { extractPrerelease } from './version/prerelease-extractor.js';
export { formatSemVer, parseSemVer, tryParseSemVer } from './version/semantic-version.js';
export { chocoToSemver, semverToChoco } from './version/converters.js';
export {
  addFixToVersions,
  formatVersions,
  parseVersions,
  toChoco,
  toSemver,
  type Versions,
} from './version/versions.js';
export {
  InternalAssemblyError,
  isVersionParseError,
  VersionParseError,
  type VersionErrorKind,
} from './errors/version-error.js';
export {
  ChocoVersionSchema,
  deserializeVersions,
  serializeVersions,
  VersionsSchema,
} from './schemas/version.schema.js';
export {
  buildVersionReport,
  renderVersionReport,
  type VersionReport,
  type VersionReportOptions,
} from './report/version-report.js';
export type { SemVer } from 'semver';
