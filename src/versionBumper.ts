import { ManifestAccessor } from './manifest/manifestAccessor';
import { applyBump, formatVersion, parseVersion, readComponent } from './version/semanticVersion';
import { Logger } from './utils/logger';
import { ToolConfig } from './types/config';
import { BumpOperation, ReadTarget } from './types/version';

export interface BumpResult {
  previous: string;
  next: string;
  written: boolean;
}

export interface BumpOptions {
  dryRun?: boolean;
}

/**
 * Performs one `read` or `bump` against the manifest named in the config.
 */
export class VersionBumper {
  private config: ToolConfig;
  private logger: Logger;
  private accessor: ManifestAccessor;

  constructor(config: ToolConfig, logger: Logger, accessor: ManifestAccessor = new ManifestAccessor(logger)) {
    this.config = config;
    this.logger = logger;
    this.accessor = accessor;
  }

  public read(target: ReadTarget): string {
    const doc = this.accessor.load(this.config.manifestPath);
    const version = parseVersion(this.accessor.getVersion(doc));
    return readComponent(version, target);
  }

  public bump(operation: BumpOperation, options: BumpOptions = {}): BumpResult {
    if (this.logger.isDebugEnabled()) {
      this.logger.debug(`Applying ${JSON.stringify(operation)} to ${this.config.manifestPath}`);
    }
    const doc = this.accessor.load(this.config.manifestPath);
    const previous = this.accessor.getVersion(doc);

    // A full replacement does not need the current value to be valid.
    const next = operation.kind === 'version'
      ? formatVersion(parseVersion(operation.value))
      : formatVersion(applyBump(parseVersion(previous), operation));

    if (options.dryRun) {
      this.logger.info(`Dry run: would change version ${previous} -> ${next}`);
      return { previous, next, written: false };
    }

    const updated = this.accessor.setVersion(doc, next);
    this.accessor.save(updated, this.config.manifestPath);
    this.logger.info(`Changed version ${previous} -> ${next} in ${this.config.manifestPath}`);

    return { previous, next, written: true };
  }
}
