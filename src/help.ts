/**
 * Help text for the command line surface
 */

import { VERSION } from './index.js';

/**
 * Main help text shown with --help
 */
export function mainHelp(): string {
  return `choco-version/${VERSION}

Usage:
  $ choco-version <versions...> [options]

Shows how each version is read as a Chocolatey version and as a semantic
version, and what each reading converts to.

Options:
  --with-fix-version  Also display the fix version that would be created
  --json              Print the report as JSON
  --verbose           Show debug output
  --no-color          Accepted for compatibility; output is never colored
  -v, --version       Display version number
  -h, --help          Display this message
`;
}
