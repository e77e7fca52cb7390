/**
 * Version Report — shows how raw version strings are read by each grammar
 * and what they convert to on the other side.
 *
 * Every raw string is tried as a Chocolatey version and, separately, as a
 * semantic version. A grammar that rejects the string reports "None".
 */

import { VersionParseError } from '../errors/version-error.js';
import { ChocoVersion } from '../version/choco-version.js';
import { chocoToSemver, semverToChoco } from '../version/converters.js';
import { formatSemVer, tryParseSemVer } from '../version/semantic-version.js';

// ---------------------------------------------------------------------------
// Public interfaces
// ---------------------------------------------------------------------------

export interface ChocoSection {
  chocolatey: string;
  semverFromChoco: string;
  chocolateyFix?: string;
}

export interface SemverSection {
  semver: string;
  chocoFromSemver: string;
  chocolateyFix?: string;
}

export interface VersionReport {
  raw: string;
  /** null when the raw string is not a Chocolatey version */
  choco: ChocoSection | null;
  /** null when the raw string is not a semantic version */
  semver: SemverSection | null;
  /** Fix versions that could not be created */
  fixErrors: string[];
}

export interface VersionReportOptions {
  withFixVersion: boolean;
  /** Date used for fix versions; defaults to now */
  today?: Date;
}

const NAME_WIDTH = 18;
const MISSING = 'None';

// ---------------------------------------------------------------------------
// buildVersionReport
// ---------------------------------------------------------------------------

export function buildVersionReport(raw: string, options: VersionReportOptions): VersionReport {
  const fixErrors: string[] = [];

  const applyFix = (choco: ChocoVersion): string | undefined => {
    if (!options.withFixVersion) return undefined;
    try {
      choco.addFix(options.today);
      return choco.toString();
    } catch (err) {
      if (!(err instanceof VersionParseError)) throw err;
      fixErrors.push(`An error occurred while creating fix version: ${err.message}`);
      return undefined;
    }
  };

  let choco: ChocoSection | null = null;
  const parsedChoco = tryParseChoco(raw);
  if (parsedChoco) {
    choco = {
      chocolatey: parsedChoco.toString(),
      semverFromChoco: formatSemVer(chocoToSemver(parsedChoco)),
    };
    const fix = applyFix(parsedChoco);
    if (fix !== undefined) choco.chocolateyFix = fix;
  }

  let semver: SemverSection | null = null;
  const parsedSemver = tryParseSemVer(raw);
  if (parsedSemver) {
    const converted = semverToChoco(parsedSemver);
    semver = {
      semver: formatSemVer(parsedSemver),
      chocoFromSemver: converted.toString(),
    };
    const fix = applyFix(converted);
    if (fix !== undefined) semver.chocolateyFix = fix;
  }

  return { raw, choco, semver, fixErrors };
}

// ---------------------------------------------------------------------------
// Rendering
// ---------------------------------------------------------------------------

export function formatReportLine(name: string, value: string): string {
  return `${name.padStart(NAME_WIDTH)} : ${value}`;
}

export function renderReportHeader(count: number): string {
  return `Checking ${count} ${count === 1 ? 'version' : 'versions'}...`;
}

/**
 * Render a report as the lines printed for one raw version, starting with
 * the blank line that separates it from the previous one.
 */
export function renderVersionReport(report: VersionReport): string[] {
  const lines = ['', formatReportLine('Raw Version', report.raw), ''];

  if (report.choco) {
    lines.push(formatReportLine('Chocolatey', report.choco.chocolatey));
    lines.push(formatReportLine('SemVer from Choco', report.choco.semverFromChoco));
    if (report.choco.chocolateyFix !== undefined) {
      lines.push(formatReportLine('Chocolatey Fix', report.choco.chocolateyFix));
    }
  } else {
    lines.push(formatReportLine('Chocolatey', MISSING));
    lines.push(formatReportLine('SemVer from Choco', MISSING));
  }

  lines.push('');

  if (report.semver) {
    lines.push(formatReportLine('SemVer', report.semver.semver));
    lines.push(formatReportLine('Choco from SemVer', report.semver.chocoFromSemver));
    if (report.semver.chocolateyFix !== undefined) {
      lines.push(formatReportLine('Chocolatey Fix', report.semver.chocolateyFix));
    }
  } else {
    lines.push(formatReportLine('SemVer', MISSING));
    lines.push(formatReportLine('Choco from SemVer', MISSING));
  }

  return lines;
}

/**
 * Serialize reports to pretty-printed JSON with 2-space indentation.
 */
export function serializeReports(reports: VersionReport[]): string {
  return JSON.stringify(reports, null, 2);
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function tryParseChoco(raw: string): ChocoVersion | null {
  try {
    return ChocoVersion.parse(raw);
  } catch (err) {
    if (err instanceof VersionParseError) return null;
    throw err;
  }
}
