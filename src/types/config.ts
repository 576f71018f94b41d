import { LogLevel } from '../utils/logger';
import { BumpOperation, ReadTarget } from './version';

export type CliCommand =
  | { name: 'read'; target: ReadTarget }
  | { name: 'bump'; operation: BumpOperation; dryRun: boolean };

export interface CliOptions {
  manifestPath?: string;
  logLevel?: string;
  command: CliCommand;
}

export interface ToolConfig {
  manifestPath: string; // absolute
  logLevel: LogLevel;
}
