/**
 * Command line surface: prints how each given version is read as a
 * Chocolatey version and as a semantic version, and what each converts to.
 *
 *   choco-version <versions...> [--with-fix-version] [--json] [--verbose] [--no-color]
 */

import { cac } from 'cac';
import { CliOptionsSchema } from './schemas/cli-options.schema.js';
import {
  buildVersionReport,
  renderReportHeader,
  renderVersionReport,
  serializeReports,
  type VersionReport,
} from './report/version-report.js';
import { createLogger, type Logger } from './utils/logger.js';
import { mainHelp } from './help.js';
import { VERSION } from './index.js';

export const PROGRAM_NAME = 'choco-version';

/**
 * Injectable I/O so the CLI can be driven from tests.
 */
export interface CliContext {
  stdout?: (line: string) => void;
  stderr?: (line: string) => void;
  /** Date used for fix versions; defaults to now */
  today?: Date;
}

/**
 * Run the CLI with the given arguments (without the node and script path).
 * Returns the process exit code.
 */
export function runCli(args: string[], context: CliContext = {}): number {
  const output = createLogger({ verbose: false, name: PROGRAM_NAME, stdout: context.stdout });

  // Handle --version and -v
  if (args.includes('--version') || args.includes('-v')) {
    output.info(VERSION);
    return 0;
  }

  // Handle --help and -h
  if (args.includes('--help') || args.includes('-h')) {
    output.info(mainHelp());
    return 0;
  }

  const cli = cac(PROGRAM_NAME);
  let exitCode = 0;

  cli
    .command('[...versions]', 'Show the Chocolatey and semantic version readings of each version')
    .option('--with-fix-version', 'Also display the fix version that would be created')
    .option('--json', 'Print the report as JSON')
    .option('--verbose', 'Show debug output')
    .option('--no-color', 'Accepted for compatibility; output is never colored')
    .action((versions: string[], flags: Record<string, unknown>) => {
      exitCode = runReport(versions, flags, context);
    });

  cli.help();
  cli.version(VERSION);

  try {
    cli.parse(['node', PROGRAM_NAME, ...args], { run: false });
    cli.runMatchedCommand();
  } catch (err) {
    errorLogger(context).error(getErrorMessage(err));
    return 1;
  }

  return exitCode;
}

// ---------------------------------------------------------------------------
// Internal helpers
// ---------------------------------------------------------------------------

function runReport(
  versions: string[],
  flags: Record<string, unknown>,
  context: CliContext,
): number {
  const parsed = CliOptionsSchema.safeParse({
    versions,
    withFixVersion: flags['withFixVersion'],
    verbose: flags['verbose'],
    json: flags['json'],
    color: flags['color'],
  });

  if (!parsed.success) {
    errorLogger(context).error(
      `Invalid arguments: ${parsed.error.errors.map((e) => e.message).join(', ')}`,
    );
    return 1;
  }

  const options = parsed.data;
  const logger = createLogger({
    verbose: options.verbose,
    name: PROGRAM_NAME,
    stdout: context.stdout,
    stderr: context.stderr,
  });
  logger.debug('Finished configuring logging');

  if (options.json) {
    const reports = options.versions.map((raw) =>
      buildReport(raw, options.withFixVersion, logger, context),
    );
    logger.info(serializeReports(reports));
    return 0;
  }

  // Print each version as soon as it is read
  logger.info(renderReportHeader(options.versions.length));
  for (const raw of options.versions) {
    const report = buildReport(raw, options.withFixVersion, logger, context);
    for (const line of renderVersionReport(report)) {
      logger.info(line);
    }
  }

  return 0;
}

function buildReport(
  raw: string,
  withFixVersion: boolean,
  logger: Logger,
  context: CliContext,
): VersionReport {
  const report = buildVersionReport(raw, { withFixVersion, today: context.today });
  logger.debug(
    `${report.raw}: chocolatey=${report.choco ? 'yes' : 'no'}, semver=${report.semver ? 'yes' : 'no'}`,
  );
  for (const message of report.fixErrors) {
    logger.error(message);
  }
  return report;
}

function errorLogger(context: CliContext) {
  return createLogger({ verbose: false, name: PROGRAM_NAME, stderr: context.stderr });
}

function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
