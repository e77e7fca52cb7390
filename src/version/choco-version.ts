/**
 * ChocoVersion — the four-part numeric version used by Chocolatey packages.
 *
 * Shape: `major.minor[.patch[.build]][-prerelease]`. The first three parts
 * fit in a byte, the build part is a 32-bit unsigned number so it can hold
 * a `YYYYMMDD` fix date. Pre-release identifiers are rendered with their
 * numbers zero-padded to four digits, since Chocolatey compares that text
 * lexically.
 */

import { VersionParseError } from '../errors/version-error.js';
import {
  compareIdentifierLists,
  identifierEquals,
  padNumeric,
  type Identifier,
} from './identifier.js';
import { extractPrerelease, isDigit } from './prerelease-extractor.js';

// ---------------------------------------------------------------------------
// Limits
// ---------------------------------------------------------------------------

export const MAX_VERSION_PART = 255;
export const MAX_BUILD = 4_294_967_295;
/** Builds at or above this value are treated as a date stamp. */
export const FIX_VERSION_THRESHOLD = 20_070_101;

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface ChocoEqualityOptions {
  /**
   * Compare pre-release identifiers too. Off by default: two versions that
   * only differ in their pre-release are considered equal, matching the
   * behavior packages already rely on. `compare()` always looks at them.
   */
  includePreRelease?: boolean;
}

// ---------------------------------------------------------------------------
// ChocoVersion
// ---------------------------------------------------------------------------

export class ChocoVersion {
  private _major: number;
  private _minor: number;
  private _patch: number | undefined;
  private _build: number | undefined;
  private _preRelease: readonly Identifier[] = [];

  constructor(major: number, minor: number) {
    this._major = checkPart(major, MAX_VERSION_PART, 'major');
    this._minor = checkPart(minor, MAX_VERSION_PART, 'minor');
  }

  static withPatch(major: number, minor: number, patch: number): ChocoVersion {
    const version = new ChocoVersion(major, minor);
    version.setPatch(patch);
    return version;
  }

  static withBuild(major: number, minor: number, patch: number, build: number): ChocoVersion {
    const version = ChocoVersion.withPatch(major, minor, patch);
    version.setBuild(build);
    return version;
  }

  /**
   * Parse a raw version string.
   *
   * Digit runs separated by `.` fill major, minor, patch and build. The scan
   * stops at the first other character and the remainder becomes the
   * pre-release (anything after `+` is dropped).
   *
   * @throws VersionParseError
   */
  static parse(text: string): ChocoVersion {
    if (text.length === 0) {
      throw new VersionParseError('EmptyInput', text);
    }
    if (!isDigit(text[0])) {
      throw new VersionParseError('DoesNotStartWithDigit', text);
    }

    const parts: number[] = [];
    let run = '';
    let consumed = 0;

    for (const ch of text) {
      if (isDigit(ch)) {
        run += ch;
      } else if (ch === '.') {
        parts.push(parsePart(text, parts.length, run));
        run = '';
      } else {
        break;
      }
      consumed++;
    }

    if (run !== '') {
      parts.push(parsePart(text, parts.length, run));
    }

    const [major = 0, minor = 0, patch, build] = parts;
    const version = new ChocoVersion(major, minor);
    if (patch !== undefined) version.setPatch(patch);
    if (build !== undefined) version.setBuild(build);
    version.setPrerelease(extractPrerelease(text.slice(consumed)));

    return version;
  }

  // -------------------------------------------------------------------------
  // Accessors
  // -------------------------------------------------------------------------

  get major(): number {
    return this._major;
  }

  get minor(): number {
    return this._minor;
  }

  get patch(): number | undefined {
    return this._patch;
  }

  get build(): number | undefined {
    return this._build;
  }

  get preRelease(): readonly Identifier[] {
    return this._preRelease;
  }

  setPatch(patch: number): void {
    this._patch = checkPart(patch, MAX_VERSION_PART, 'patch');
  }

  /** Setting a build also sets the patch to 0 when it has none yet. */
  setBuild(build: number): void {
    const checked = checkPart(build, MAX_BUILD, 'build');
    if (this._patch === undefined) {
      this._patch = 0;
    }
    this._build = checked;
  }

  setPrerelease(preRelease: readonly Identifier[]): void {
    this._preRelease = [...preRelease];
  }

  withPrerelease(preRelease: readonly Identifier[]): this {
    this.setPrerelease(preRelease);
    return this;
  }

  clone(): ChocoVersion {
    const copy = new ChocoVersion(this._major, this._minor);
    copy._patch = this._patch;
    copy._build = this._build;
    copy._preRelease = this._preRelease;
    return copy;
  }

  // -------------------------------------------------------------------------
  // Fix versions
  // -------------------------------------------------------------------------

  /**
   * Stamp the build part with the local date as `YYYYMMDD`.
   *
   * Only applies while the build is unset or below the date threshold; a
   * build that already holds a date is left alone.
   *
   * @throws VersionParseError if the date does not form a valid build number
   */
  addFix(today: Date = new Date()): void {
    if (this._build !== undefined && this._build >= FIX_VERSION_THRESHOLD) return;

    const stamp = formatDateStamp(today);
    this.setBuild(parseNumber(stamp, stamp, MAX_BUILD));
  }

  isFixVersion(): boolean {
    return this._build !== undefined && this._build >= FIX_VERSION_THRESHOLD;
  }

  // -------------------------------------------------------------------------
  // Comparison
  // -------------------------------------------------------------------------

  /**
   * Order by major, minor, patch, build (missing parts count as 0), then by
   * pre-release, where a version without one sorts last.
   */
  compare(other: ChocoVersion): number {
    return (
      Math.sign(this._major - other._major) ||
      Math.sign(this._minor - other._minor) ||
      Math.sign((this._patch ?? 0) - (other._patch ?? 0)) ||
      Math.sign((this._build ?? 0) - (other._build ?? 0)) ||
      compareIdentifierLists(this._preRelease, other._preRelease)
    );
  }

  static compare(a: ChocoVersion, b: ChocoVersion): number {
    return a.compare(b);
  }

  equals(other: ChocoVersion, options: ChocoEqualityOptions = {}): boolean {
    const numericEqual =
      this._major === other._major &&
      this._minor === other._minor &&
      (this._patch ?? 0) === (other._patch ?? 0) &&
      (this._build ?? 0) === (other._build ?? 0);

    if (!numericEqual || !options.includePreRelease) return numericEqual;

    return (
      this._preRelease.length === other._preRelease.length &&
      this._preRelease.every((identifier, i) => {
        const counterpart = other._preRelease[i];
        return counterpart !== undefined && identifierEquals(identifier, counterpart);
      })
    );
  }

  // -------------------------------------------------------------------------
  // Formatting
  // -------------------------------------------------------------------------

  toString(): string {
    let text = `${this._major}.${this._minor}`;
    if (this._patch !== undefined) text += `.${this._patch}`;
    if (this._build !== undefined) text += `.${this._build}`;

    let previousAlpha = false;
    for (const identifier of this._preRelease) {
      switch (identifier.kind) {
        case 'numeric':
          text += previousAlpha ? padNumeric(identifier.value) : `-${padNumeric(identifier.value)}`;
          previousAlpha = false;
          break;
        case 'alphanumeric':
          text += `-${identifier.value}`;
          previousAlpha = true;
          break;
      }
    }

    return text;
  }

  toJSON(): string {
    return this.toString();
  }
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

const PART_LIMITS = [MAX_VERSION_PART, MAX_VERSION_PART, MAX_VERSION_PART, MAX_BUILD] as const;

function parsePart(text: string, slot: number, run: string): number {
  const limit = PART_LIMITS[slot];
  if (limit === undefined) {
    throw new VersionParseError('TooManyNumericParts', text);
  }
  return parseNumber(text, run, limit);
}

function parseNumber(text: string, run: string, limit: number): number {
  if (run === '') {
    throw new VersionParseError('EmptyNumericPart', text);
  }
  const value = Number(run);
  if (!Number.isInteger(value) || value > limit) {
    throw new VersionParseError('NumericOverflow', text, `${run} exceeds ${limit}`);
  }
  return value;
}

function checkPart(value: number, limit: number, name: string): number {
  if (!Number.isInteger(value) || value < 0 || value > limit) {
    throw new RangeError(`${name} must be an integer between 0 and ${limit}, got ${value}`);
  }
  return value;
}

function formatDateStamp(date: Date): string {
  const year = String(date.getFullYear()).padStart(4, '0');
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${year}${month}${day}`;
}
