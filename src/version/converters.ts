/**
 * Converters between Chocolatey versions and semantic versions.
 *
 * Neither direction is lossless. Chocolatey has a single numeric build slot
 * and no build metadata; SemVer has no fourth number. The rules below are
 * what existing packages were published with, so they are kept as-is.
 */

import semver from 'semver';
import type { SemVer } from 'semver';
import { InternalAssemblyError } from '../errors/version-error.js';
import { ChocoVersion, MAX_VERSION_PART } from './choco-version.js';
import {
  alphanumeric,
  parseNumericValue,
  UNSTABLE_MARKER,
  type Identifier,
} from './identifier.js';
import { extractPrerelease, isDigit } from './prerelease-extractor.js';
import { semverPrerelease } from './semantic-version.js';

// ---------------------------------------------------------------------------
// Chocolatey -> SemVer
// ---------------------------------------------------------------------------

/**
 * Convert a Chocolatey version to a semantic version.
 *
 * Pre-release labels are joined with `-`. The last number seen is held
 * back and attached at the end: with `.` when a pre-release exists, with
 * `+` otherwise. The Chocolatey build part takes the other delimiter, so
 * `1.2.2.5-unstable-0050` becomes `1.2.2-unstable.50+5`.
 *
 * @throws InternalAssemblyError if the assembled text is rejected by semver
 */
export function chocoToSemver(choco: ChocoVersion): SemVer {
  let text = `${choco.major}.${choco.minor}.${choco.patch ?? 0}`;
  let held = 0n;

  for (const identifier of choco.preRelease) {
    switch (identifier.kind) {
      case 'alphanumeric': {
        const { prefix, suffix } = splitAtFirstDigit(identifier.value);
        if (prefix !== '') {
          text += `-${prefix}`;
        }
        const number = parseNumericValue(suffix);
        if (number !== undefined) {
          if (held > 0n) text += `-${held}`;
          held = number;
        } else if (suffix !== '') {
          text += prefix === '' ? `-${suffix}` : suffix;
        }
        break;
      }
      case 'numeric':
        if (held > 0n) text += `-${held}`;
        held = identifier.value;
        break;
    }
  }

  const [delimiter, altDelimiter] = text.includes('-')
    ? (['.', '+'] as const)
    : (['+', '-'] as const);

  if (choco.build !== undefined) {
    if (held > 0n) {
      text += `${delimiter}${held}${altDelimiter}${choco.build}`;
    } else {
      text += `${delimiter}${choco.build}`;
    }
  } else if (held > 0n) {
    text += `${delimiter}${held}`;
  }

  const parsed = semver.parse(text);
  if (!parsed) {
    throw new InternalAssemblyError(text);
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// SemVer -> Chocolatey
// ---------------------------------------------------------------------------

/**
 * Convert a semantic version to a Chocolatey version.
 *
 * Major, minor and patch saturate at 255. Alphanumeric pre-release
 * identifiers go through the same extractor the Chocolatey parser uses; a
 * leading numeric one gets the `unstable` label. Build metadata is dropped.
 */
export function semverToChoco(version: SemVer): ChocoVersion {
  const choco = ChocoVersion.withPatch(
    saturate(version.major),
    saturate(version.minor),
    saturate(version.patch),
  );

  const preRelease: Identifier[] = [];
  for (const identifier of semverPrerelease(version)) {
    switch (identifier.kind) {
      case 'numeric':
        if (preRelease.length === 0) {
          preRelease.push(alphanumeric(UNSTABLE_MARKER));
        }
        preRelease.push(identifier);
        break;
      case 'alphanumeric':
        preRelease.push(...extractPrerelease(identifier.value));
        break;
    }
  }

  return choco.withPrerelease(preRelease);
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function saturate(value: number): number {
  return Math.min(value, MAX_VERSION_PART);
}

function splitAtFirstDigit(value: string): { prefix: string; suffix: string } {
  let index = 0;
  while (index < value.length && !isDigit(value[index])) {
    index++;
  }
  return { prefix: value.slice(0, index), suffix: value.slice(index) };
}
