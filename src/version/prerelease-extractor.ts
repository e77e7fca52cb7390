/**
 * Pre-release extractor — turns the free-form tail of a version string into
 * the identifier list Chocolatey can express.
 *
 * Chocolatey only sorts pre-release text lexically, so letters and digits
 * are split apart and a bare leading number gets an "unstable" label. When
 * a real label shows up later in the string, it replaces that placeholder
 * and the number moves behind it: `55-alpha` becomes `alpha`, `55`.
 */

import {
  alphanumeric,
  identifierToString,
  isUnstableMarker,
  numeric,
  padNumeric,
  parseNumericValue,
  UNSTABLE_MARKER,
  type Identifier,
} from './identifier.js';

const MAX_PADDED_NUMBER = 4_294_967_295n;

export function isDigit(ch: string | undefined): boolean {
  return ch !== undefined && ch.length === 1 && ch >= '0' && ch <= '9';
}

function hasNonDigit(value: string): boolean {
  for (const ch of value) {
    if (!isDigit(ch)) return true;
  }
  return false;
}

/**
 * Extract pre-release identifiers from a version suffix.
 * Everything from the first `+` on is build metadata and is ignored.
 */
export function extractPrerelease(suffix: string): Identifier[] {
  const result: Identifier[] = [];
  let current = '';
  // A token held back by the unstable-marker promotion, flushed after the
  // token that replaced the marker.
  let pending = '';

  for (const ch of suffix) {
    if (ch === '+') break;

    if (ch === '-' || ch === '.') {
      const token = toIdentifier(current);
      if (token) {
        current = '';
        result.push(token);
      }
      const promoted = toIdentifier(pending);
      if (promoted) {
        result.push(promoted);
        pending = '';
      }
      continue;
    }

    if (isDigit(ch)) {
      if (result.length === 0 && current === '') {
        result.push(alphanumeric(UNSTABLE_MARKER));
      } else if (hasNonDigit(current)) {
        const token = toIdentifier(current);
        if (token) {
          current = '';
          result.push(token);
        }
      }
    } else if (current === '' && result.length > 1 && isUnstableMarker(result[0])) {
      result.shift();
      const last = result.pop();
      pending = last ? identifierToString(last) : '';
    } else if (current !== '' && isUnstableMarker(result[0])) {
      result.shift();
      pending = current;
      current = '';
    }

    current += ch;
  }

  const token = toIdentifier(current);
  if (token) result.push(token);

  const promoted = toIdentifier(pending);
  if (promoted) result.push(promoted);

  return result;
}

/**
 * Convert one accumulated token into an identifier.
 *
 * Pure digit runs become numeric. Mixed tokens keep their letters and move
 * the digits behind them, zero-padded: `5beta` -> `beta0005`.
 */
export function toIdentifier(value: string): Identifier | undefined {
  if (value === '') return undefined;

  let letters = '';
  let digits = '';
  for (const ch of value) {
    if (isDigit(ch)) {
      digits += ch;
    } else {
      letters += ch;
    }
  }

  if (letters === '') {
    const whole = parseNumericValue(digits);
    if (whole !== undefined) return numeric(whole);
  }

  if (digits === '') return alphanumeric(letters);

  const parsed = BigInt(digits);
  if (parsed <= MAX_PADDED_NUMBER) {
    return alphanumeric(`${letters}${padNumeric(parsed)}`);
  }
  return alphanumeric(`${letters}${digits}`);
}
