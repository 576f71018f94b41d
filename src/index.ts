import { CommanderError } from 'commander';
import { parseCliArguments } from './cli';
import { ConfigLoader } from './config/configLoader';
import { VersionBumper } from './versionBumper';
import { Logger } from './utils/logger';

export interface MainIo {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
  env: NodeJS.ProcessEnv;
}

const processIo: MainIo = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  env: process.env,
};

/**
 * Runs one invocation and returns the process exit code.
 */
export function main(argv: string[] = process.argv, io: MainIo = processIo): number {
  try {
    const cliOptions = parseCliArguments(argv, { writeOut: io.stdout, writeErr: io.stderr });
    const config = ConfigLoader.resolveConfig(cliOptions, io.env);
    const logger = new Logger(config.logLevel);
    const bumper = new VersionBumper(config, logger);
    const { command } = cliOptions;

    if (command.name === 'read') {
      io.stdout(`${bumper.read(command.target)}\n`);
      return 0;
    }

    const result = bumper.bump(command.operation, { dryRun: command.dryRun });
    if (!result.written) {
      io.stdout(`${result.next}\n`);
    }
    return 0;
  } catch (error) {
    // Commander has already printed its own message (or the help/version text).
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    io.stderr(`error: ${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}
