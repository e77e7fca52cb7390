import { describe, it, expect } from 'vitest';
import {
  addFixToVersions,
  formatVersions,
  parseVersions,
  toChoco,
  toSemver,
  type Versions,
} from '../src/version/versions.js';
import { ChocoVersion } from '../src/version/choco-version.js';
import { formatSemVer, parseSemVer, tryParseSemVer } from '../src/version/semantic-version.js';
import { VersionParseError, type VersionErrorKind } from '../src/errors/version-error.js';

function errorKind(fn: () => unknown): VersionErrorKind | null {
  try {
    fn();
    return null;
  } catch (err) {
    if (err instanceof VersionParseError) return err.kind;
    throw err;
  }
}

// ---------------------------------------------------------------------------
// parseVersions
// ---------------------------------------------------------------------------

describe('parseVersions', () => {
  it('should use a semantic version for three part versions', () => {
    const versions = parseVersions('5.1.0');

    expect(versions.kind).toBe('semver');
    expect(formatVersions(versions)).toBe('5.1.0');
  });

  it('should use a Chocolatey version for four part versions', () => {
    const versions = parseVersions('5.1.6.4');

    expect(versions.kind).toBe('choco');
    if (versions.kind === 'choco') {
      expect(versions.version.equals(ChocoVersion.withBuild(5, 1, 6, 4))).toBe(true);
    }
  });

  it('should fail with the Chocolatey error when neither grammar fits', () => {
    expect(errorKind(() => parseVersions(''))).toBe('EmptyInput');
    expect(errorKind(() => parseVersions('invalid'))).toBe('DoesNotStartWithDigit');
    expect(errorKind(() => parseVersions('2.0.2.5.1'))).toBe('TooManyNumericParts');
  });

  it('should not accept a leading v as a semantic version', () => {
    expect(tryParseSemVer('v1.2.3')).toBeNull();
    expect(errorKind(() => parseVersions('v1.2.3'))).toBe('DoesNotStartWithDigit');
  });

  it('should report SemverParseFailure from the semver parser', () => {
    expect(errorKind(() => parseSemVer('1.2'))).toBe('SemverParseFailure');
    expect(errorKind(() => parseSemVer(' 1.2.3'))).toBe('SemverParseFailure');
  });
});

// ---------------------------------------------------------------------------
// Conversions
// ---------------------------------------------------------------------------

describe('toSemver', () => {
  it('should convert a Chocolatey version', () => {
    const versions: Versions = {
      kind: 'choco',
      version: ChocoVersion.parse('2.1.0.5-alpha0055'),
    };

    expect(formatSemVer(toSemver(versions))).toBe('2.1.0-alpha.55+5');
  });

  it('should return a copy of a semantic version', () => {
    const versions = parseVersions('5.2.2-alpha.5+55');
    const converted = toSemver(versions);

    expect(formatSemVer(converted)).toBe('5.2.2-alpha.5+55');
    expect(converted).not.toBe(versions.version);
  });
});

describe('toChoco', () => {
  it('should convert a semantic version', () => {
    expect(toChoco(parseVersions('1.0.5-beta.55+99')).toString()).toBe('1.0.5-beta0055');
  });

  it('should return a copy of a Chocolatey version', () => {
    const versions: Versions = {
      kind: 'choco',
      version: ChocoVersion.parse('5.2.1.56-unstable-0050'),
    };
    const converted = toChoco(versions);

    expect(converted.toString()).toBe('5.2.1.56-unstable0050');
    expect(converted).not.toBe(versions.version);
  });
});

describe('formatVersions', () => {
  it.each([
    ['4.2.1-alpha.5+6', '4.2.1-alpha.5+6'],
    ['3.2', '3.2'],
    ['5.2.1.6-beta-0005', '5.2.1.6-beta0005'],
  ])('should display %s as %s', (input, expected) => {
    expect(formatVersions(parseVersions(input))).toBe(expected);
  });

  it('should display a Chocolatey version in its own format', () => {
    const versions: Versions = {
      kind: 'choco',
      version: ChocoVersion.parse('2.1.0-unstable-0050'),
    };

    expect(formatVersions(versions)).toBe('2.1.0-unstable0050');
  });
});

describe('addFixToVersions', () => {
  it('should stamp a Chocolatey version', () => {
    const versions = parseVersions('1.2.3.4');
    addFixToVersions(versions, new Date(2024, 2, 5));

    expect(formatVersions(versions)).toBe('1.2.3.20240305');
  });

  it('should refuse a semantic version', () => {
    expect(() => addFixToVersions(parseVersions('1.2.3'))).toThrow(TypeError);
  });
});
