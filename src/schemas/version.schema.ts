import { z } from 'zod';
import { VersionParseError } from '../errors/version-error.js';
import { ChocoVersion } from '../version/choco-version.js';
import { formatVersions, parseVersions, type Versions } from '../version/versions.js';

/**
 * Run a version parser inside a zod transform, turning parse failures into
 * schema issues that carry the error kind.
 */
function parseWith<T>(parser: (text: string) => T) {
  return (value: string, ctx: z.RefinementCtx): T => {
    try {
      return parser(value);
    } catch (err) {
      if (err instanceof VersionParseError) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: err.message,
          params: { kind: err.kind },
        });
        return z.NEVER;
      }
      throw err;
    }
  };
}

/**
 * A Chocolatey version stored as its string form, e.g. in package metadata.
 */
export const ChocoVersionSchema = z
  .string()
  .transform(parseWith((text) => ChocoVersion.parse(text)));

export type ChocoVersionSchema = z.output<typeof ChocoVersionSchema>;

/**
 * A version string of either grammar; semantic versions win when both fit.
 */
export const VersionsSchema = z.string().transform(parseWith(parseVersions));

export type VersionsSchema = z.output<typeof VersionsSchema>;

/**
 * Serialize a parsed version back to the string it is stored as.
 */
export function serializeVersions(versions: Versions): string {
  return JSON.stringify(formatVersions(versions));
}

/**
 * Deserialize a JSON string literal into a version.
 * Throws a ZodError if the value is not a string or not a version.
 */
export function deserializeVersions(json: string): Versions {
  const parsed: unknown = JSON.parse(json);
  return VersionsSchema.parse(parsed);
}
