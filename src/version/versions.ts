/**
 * Versions — a version that is either a semantic version or a Chocolatey
 * version, whichever grammar the raw string fits first.
 */

import semver from 'semver';
import type { SemVer } from 'semver';
import { ChocoVersion } from './choco-version.js';
import { chocoToSemver, semverToChoco } from './converters.js';
import { formatSemVer, tryParseSemVer } from './semantic-version.js';

export type Versions =
  | { readonly kind: 'semver'; readonly version: SemVer }
  | { readonly kind: 'choco'; readonly version: ChocoVersion };

/**
 * Parse a raw version string, preferring SemVer and falling back to the
 * Chocolatey grammar. When both fail, the Chocolatey error is thrown.
 *
 * @throws VersionParseError
 */
export function parseVersions(text: string): Versions {
  const parsed = tryParseSemVer(text);
  if (parsed) {
    return { kind: 'semver', version: parsed };
  }
  return { kind: 'choco', version: ChocoVersion.parse(text) };
}

export function toChoco(versions: Versions): ChocoVersion {
  switch (versions.kind) {
    case 'semver':
      return semverToChoco(versions.version);
    case 'choco':
      return versions.version.clone();
  }
}

export function toSemver(versions: Versions): SemVer {
  switch (versions.kind) {
    case 'semver':
      return new semver.SemVer(formatSemVer(versions.version));
    case 'choco':
      return chocoToSemver(versions.version);
  }
}

export function formatVersions(versions: Versions): string {
  switch (versions.kind) {
    case 'semver':
      return formatSemVer(versions.version);
    case 'choco':
      return versions.version.toString();
  }
}

/**
 * Apply a fix version. Only Chocolatey versions have a build slot to stamp.
 *
 * @throws TypeError for semantic versions
 */
export function addFixToVersions(versions: Versions, today?: Date): void {
  switch (versions.kind) {
    case 'semver':
      throw new TypeError(
        `Fix versions are not supported for semantic versions (${formatSemVer(versions.version)})`,
      );
    case 'choco':
      versions.version.addFix(today);
      return;
  }
}
