/**
 * Unit tests for the pre-release extractor and the identifier model.
 */

import { describe, it, expect } from 'vitest';
import { extractPrerelease, toIdentifier } from '../src/version/prerelease-extractor.js';
import {
  alphanumeric,
  compareIdentifierLists,
  compareIdentifiers,
  identifierEquals,
  numeric,
} from '../src/version/identifier.js';

// ---------------------------------------------------------------------------
// extractPrerelease
// ---------------------------------------------------------------------------

describe('extractPrerelease', () => {
  it('should return nothing for an empty suffix', () => {
    expect(extractPrerelease('')).toEqual([]);
  });

  it('should group letters and digits of a token separately', () => {
    expect(extractPrerelease('-alpha54.2')).toEqual([
      alphanumeric('alpha'),
      numeric(54),
      numeric(2),
    ]);
  });

  it('should split trailing digits from a label', () => {
    expect(extractPrerelease('-beta50')).toEqual([alphanumeric('beta'), numeric(50)]);
  });

  it('should add the unstable marker before a bare number', () => {
    expect(extractPrerelease('-55')).toEqual([alphanumeric('unstable'), numeric(55)]);
  });

  it('should keep a bare number beyond the safe integer range numeric', () => {
    expect(extractPrerelease('-10000000000000000')).toEqual([
      alphanumeric('unstable'),
      numeric(10000000000000000n),
    ]);
  });

  it('should replace the unstable marker with a later label', () => {
    expect(extractPrerelease('-55-alpha')).toEqual([alphanumeric('alpha'), numeric(55)]);
  });

  it('should replace the unstable marker with a directly attached label', () => {
    expect(extractPrerelease('55beta')).toEqual([alphanumeric('beta'), numeric(55)]);
    expect(extractPrerelease('-5beta')).toEqual([alphanumeric('beta'), numeric(5)]);
  });

  it('should flush the promoted number at the next separator', () => {
    expect(extractPrerelease('-55-alpha-beta')).toEqual([
      alphanumeric('alpha'),
      numeric(55),
      alphanumeric('beta'),
    ]);
  });

  it('should keep an explicit unstable label', () => {
    expect(extractPrerelease('-unstable-0050')).toEqual([
      alphanumeric('unstable'),
      numeric(50),
    ]);
  });

  it('should pad digits that follow letters inside one token', () => {
    expect(extractPrerelease('-alpha.5beta')).toEqual([
      alphanumeric('alpha'),
      alphanumeric('beta0005'),
    ]);
  });

  it('should keep consecutive labels', () => {
    expect(extractPrerelease('-beta-ceta')).toEqual([alphanumeric('beta'), alphanumeric('ceta')]);
  });

  it('should ignore build metadata', () => {
    expect(extractPrerelease('+55')).toEqual([]);
    expect(extractPrerelease('-alpha+meta.5')).toEqual([alphanumeric('alpha')]);
  });
});

// ---------------------------------------------------------------------------
// toIdentifier
// ---------------------------------------------------------------------------

describe('toIdentifier', () => {
  it('should return undefined for an empty token', () => {
    expect(toIdentifier('')).toBeUndefined();
  });

  it('should read digits as a number', () => {
    expect(toIdentifier('0042')).toEqual(numeric(42));
  });

  it('should move digits behind the letters and pad them', () => {
    expect(toIdentifier('5beta')).toEqual(alphanumeric('beta0005'));
  });

  it('should not pad digits too large for a build number', () => {
    expect(toIdentifier('beta99999999999')).toEqual(alphanumeric('beta99999999999'));
  });

  it('should read digits up to 64 bits as a number', () => {
    expect(toIdentifier('9007199254740993')).toEqual(numeric(9007199254740993n));
    expect(toIdentifier('18446744073709551615')).toEqual(numeric(18446744073709551615n));
  });

  it('should keep digits past 64 bits as text', () => {
    expect(toIdentifier('18446744073709551616')).toEqual(alphanumeric('18446744073709551616'));
  });
});

// ---------------------------------------------------------------------------
// Identifier ordering
// ---------------------------------------------------------------------------

describe('compareIdentifiers', () => {
  it('should compare numbers by value', () => {
    expect(compareIdentifiers(numeric(2), numeric(10))).toBe(-1);
    expect(compareIdentifiers(numeric(9007199254740993n), numeric(9007199254740992n))).toBe(1);
    expect(compareIdentifiers(numeric(10), numeric(2))).toBe(1);
    expect(compareIdentifiers(numeric(3), numeric(3))).toBe(0);
  });

  it('should sort numbers before labels', () => {
    expect(compareIdentifiers(numeric(99), alphanumeric('a'))).toBe(-1);
    expect(compareIdentifiers(alphanumeric('a'), numeric(99))).toBe(1);
  });

  it('should compare labels lexically', () => {
    expect(compareIdentifiers(alphanumeric('alpha'), alphanumeric('beta'))).toBe(-1);
    expect(compareIdentifiers(alphanumeric('rc'), alphanumeric('rc'))).toBe(0);
  });

  it('should only consider identifiers of the same kind equal', () => {
    expect(identifierEquals(numeric(1), alphanumeric('1'))).toBe(false);
    expect(identifierEquals(numeric(1), numeric(1))).toBe(true);
  });
});

describe('compareIdentifierLists', () => {
  it('should sort a release after any pre-release', () => {
    expect(compareIdentifierLists([], [])).toBe(0);
    expect(compareIdentifierLists([], [alphanumeric('alpha')])).toBe(1);
    expect(compareIdentifierLists([alphanumeric('alpha')], [])).toBe(-1);
  });

  it('should sort a shorter shared prefix first', () => {
    expect(
      compareIdentifierLists([alphanumeric('alpha')], [alphanumeric('alpha'), numeric(1)]),
    ).toBe(-1);
  });

  it('should compare element by element', () => {
    expect(
      compareIdentifierLists(
        [alphanumeric('alpha'), numeric(5)],
        [alphanumeric('alpha'), numeric(10)],
      ),
    ).toBe(-1);
  });
});
