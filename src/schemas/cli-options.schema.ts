import { z } from 'zod';

export const CliOptionsSchema = z.object({
  /** Raw version strings to inspect, in the order given */
  versions: z.array(z.string()).min(1, 'At least one version is required'),
  /** Also show the fix version each Chocolatey result would get */
  withFixVersion: z.boolean().default(false),
  /** Emit debug output on stderr */
  verbose: z.boolean().default(false),
  /** Print the report as JSON instead of aligned text */
  json: z.boolean().default(false),
  /** `--no-color` sets this to false; output is never colored either way */
  color: z.boolean().default(true),
});

export type CliOptionsSchema = z.infer<typeof CliOptionsSchema>;
