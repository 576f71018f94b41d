import * as path from 'path';
import { CliOptions, ToolConfig } from '../types/config';
import { LOG_LEVELS, LogLevel, isLogLevel } from '../utils/logger';
import { VersionBumpError } from '../utils/errors';

export const DEFAULT_MANIFEST_PATH = 'Cargo.toml';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

export const MANIFEST_PATH_ENV = 'VERSION_BUMP_MANIFEST_PATH';
export const LOG_LEVEL_ENV = 'VERSION_BUMP_LOG_LEVEL';

export class ConfigLoader {
  /**
   * Resolves the settings of one invocation from various sources in priority order:
   * 1. CLI --manifest-path / --log-level
   * 2. VERSION_BUMP_MANIFEST_PATH / VERSION_BUMP_LOG_LEVEL environment variables
   * 3. ./Cargo.toml and log level "warn"
   */
  public static resolveConfig(
    cliOptions: Pick<CliOptions, 'manifestPath' | 'logLevel'>,
    env: NodeJS.ProcessEnv = process.env,
    cwd: string = process.cwd()
  ): ToolConfig {
    const manifestPath = this.firstNonEmpty(cliOptions.manifestPath, env[MANIFEST_PATH_ENV]) ?? DEFAULT_MANIFEST_PATH;
    const logLevel = this.firstNonEmpty(cliOptions.logLevel, env[LOG_LEVEL_ENV]) ?? DEFAULT_LOG_LEVEL;

    if (!isLogLevel(logLevel)) {
      throw new VersionBumpError(
        'InvalidInvocation',
        `Invalid log level "${logLevel}". Expected one of: ${LOG_LEVELS.join(', ')}`
      );
    }

    return {
      manifestPath: path.resolve(cwd, manifestPath),
      logLevel,
    };
  }

  private static firstNonEmpty(...values: Array<string | undefined>): string | undefined {
    return values.find((value) => value !== undefined && value.trim() !== '');
  }
}
