import { Command, OutputConfiguration } from 'commander';
import { CliCommand, CliOptions } from './types/config';
import { BUMP_KINDS, BumpKind, BumpOperation, READ_TARGETS, ReadTarget } from './types/version';
import { VersionBumpError } from './utils/errors';
import * as packageJson from '../package.json';

interface ReadFlags {
  version?: boolean;
  major?: boolean;
  minor?: boolean;
  patch?: boolean;
  pre?: boolean;
  build?: boolean;
}

interface BumpFlags {
  version?: string;
  major?: boolean;
  minor?: boolean;
  patch?: boolean;
  pre?: string;
  build?: string;
  dryRun?: boolean;
}

interface GlobalFlags {
  manifestPath?: string;
  logLevel?: string;
}

function flagList(names: readonly string[]): string {
  return names.map((name) => `--${name}`).join(', ');
}

function selectReadTarget(flags: ReadFlags): ReadTarget {
  const selected = READ_TARGETS.filter((target) => flags[target] === true);
  if (selected.length !== 1) {
    throw new VersionBumpError(
      'InvalidInvocation',
      `read requires exactly one of ${flagList(READ_TARGETS)} (got ${selected.length === 0 ? 'none' : flagList(selected)})`
    );
  }
  return selected[0];
}

function toBumpOperation(kind: BumpKind, flags: BumpFlags): BumpOperation {
  switch (kind) {
    case 'major':
    case 'minor':
    case 'patch':
      return { kind };
    case 'pre':
      return { kind, value: flags.pre ?? '' };
    case 'build':
      return { kind, value: flags.build ?? '' };
    case 'version':
      return { kind, value: flags.version ?? '' };
  }
}

function selectBumpOperation(flags: BumpFlags): BumpOperation {
  const selected = BUMP_KINDS.filter((kind) => flags[kind] !== undefined && flags[kind] !== false);
  if (selected.length !== 1) {
    throw new VersionBumpError(
      'InvalidInvocation',
      `bump requires exactly one of ${flagList(BUMP_KINDS)} (got ${selected.length === 0 ? 'none' : flagList(selected)})`
    );
  }
  return toBumpOperation(selected[0], flags);
}

/**
 * Builds the commander program. Errors commander detects itself are thrown as
 * `CommanderError` (see `exitOverride`) rather than exiting the process.
 */
export function createProgram(onCommand: (command: CliCommand) => void, output?: OutputConfiguration): Command {
  const program = new Command();

  // Set before the subcommands are added so they inherit it.
  if (output) {
    program.configureOutput(output);
  }

  program
    .name('version-bump')
    .description('Read or bump the semantic version stored in a Cargo.toml manifest')
    .version(packageJson.version)
    .exitOverride()
    .enablePositionalOptions()
    .allowExcessArguments(false)
    .option('--manifest-path <path>', 'path to the manifest (default: Cargo.toml)')
    .option('--log-level <level>', 'diagnostic log level: debug, info, warn or error (default: warn)');

  program
    .command('read')
    .description('Print one component of the current version')
    .allowExcessArguments(false)
    .option('--version', 'print the full VERSION')
    .option('--major', 'print the MAJOR version')
    .option('--minor', 'print the MINOR version')
    .option('--patch', 'print the PATCH version')
    .option('--pre', 'print the PRE-RELEASE label (empty when there is none)')
    .option('--build', 'print the BUILD metadata (empty when there is none)')
    .action((flags: ReadFlags) => {
      onCommand({ name: 'read', target: selectReadTarget(flags) });
    });

  program
    .command('bump')
    .description('Change one component of the version and write it back to the manifest')
    .allowExcessArguments(false)
    .option('--version <version>', 'set the full VERSION')
    .option('--major', 'bump the MAJOR version')
    .option('--minor', 'bump the MINOR version')
    .option('--patch', 'bump the PATCH version')
    .option('--pre <identifiers>', 'set the PRE-RELEASE label')
    .option('--build <identifiers>', 'set the BUILD metadata')
    .option('--dry-run', 'print the new version without writing the manifest')
    .action((flags: BumpFlags) => {
      onCommand({ name: 'bump', operation: selectBumpOperation(flags), dryRun: flags.dryRun === true });
    });

  return program;
}

/**
 * Parses `argv` (node-style, program name at index 1) into the options of one invocation.
 * Throws `VersionBumpError` of kind InvalidInvocation when no or several target flags are given.
 */
export function parseCliArguments(argv: string[] = process.argv, output?: OutputConfiguration): CliOptions {
  const selection: { command?: CliCommand } = {};
  const program = createProgram((command) => {
    selection.command = command;
  }, output);

  program.parse(argv);

  const { command } = selection;
  if (command === undefined) {
    throw new VersionBumpError('InvalidInvocation', 'A subcommand is required: read or bump');
  }

  const options = program.opts<GlobalFlags>();

  return {
    manifestPath: options.manifestPath,
    logLevel: options.logLevel,
    command,
  };
}
