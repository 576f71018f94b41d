export type VersionBumpErrorKind =
  | 'ManifestNotFound'
  | 'ManifestParseError'
  | 'VersionFieldMissing'
  | 'MalformedVersion'
  | 'MalformedPreRelease'
  | 'MalformedBuildMetadata'
  | 'WriteError'
  | 'InvalidInvocation';

/**
 * Error raised by every failing operation of the tool.
 * `kind` tells callers (and tests) which failure occurred without matching on messages.
 */
export class VersionBumpError extends Error {
  public readonly kind: VersionBumpErrorKind;

  constructor(kind: VersionBumpErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'VersionBumpError';
    this.kind = kind;
  }
}
