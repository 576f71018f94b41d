import * as semver from 'semver';
import { VersionBumpError } from '../utils/errors';
import { BumpOperation, ReadTarget } from '../types/version';

export type PreReleaseIdentifier = string | number;

/**
 * Immutable semantic version. Every operation below returns a new value.
 */
export interface Version {
  readonly major: number;
  readonly minor: number;
  readonly patch: number;
  readonly prerelease: readonly PreReleaseIdentifier[];
  readonly build: readonly string[];
}

function fromSemVer(parsed: semver.SemVer): Version {
  return {
    major: parsed.major,
    minor: parsed.minor,
    patch: parsed.patch,
    prerelease: [...parsed.prerelease],
    build: [...parsed.build],
  };
}

/**
 * Parses a version in the exact `MAJOR.MINOR.PATCH[-PRE][+BUILD]` form.
 *
 * The `semver` package also accepts a leading `v` or `=` and surrounding
 * whitespace. Those inputs are rejected here: a string is accepted only if
 * formatting the parsed value gives it back unchanged.
 */
export function parseVersion(text: string): Version {
  const parsed = semver.parse(text);
  if (parsed) {
    const version = fromSemVer(parsed);
    if (formatVersion(version) === text) {
      return version;
    }
  }
  throw new VersionBumpError(
    'MalformedVersion',
    `Invalid version "${text}": expected MAJOR.MINOR.PATCH with optional -PRE-RELEASE and +BUILD suffixes`
  );
}

/** `semver.SemVer#format()` leaves build metadata out, so the full string is assembled here. */
export function formatVersion(version: Version): string {
  let text = `${version.major}.${version.minor}.${version.patch}`;
  if (version.prerelease.length > 0) {
    text += `-${version.prerelease.join('.')}`;
  }
  if (version.build.length > 0) {
    text += `+${version.build.join('.')}`;
  }
  return text;
}

function increment(value: number, component: string): number {
  if (value >= Number.MAX_SAFE_INTEGER) {
    throw new VersionBumpError(
      'MalformedVersion',
      `Cannot increment ${component} version ${value}: the result exceeds ${Number.MAX_SAFE_INTEGER}`
    );
  }
  return value + 1;
}

export function bumpMajor(version: Version): Version {
  return { major: increment(version.major, 'major'), minor: 0, patch: 0, prerelease: [], build: [] };
}

export function bumpMinor(version: Version): Version {
  return { major: version.major, minor: increment(version.minor, 'minor'), patch: 0, prerelease: [], build: [] };
}

export function bumpPatch(version: Version): Version {
  return {
    major: version.major,
    minor: version.minor,
    patch: increment(version.patch, 'patch'),
    prerelease: [],
    build: [],
  };
}

export function setPreRelease(version: Version, text: string): Version {
  // The library has no entry point for a lone label, so it is parsed in the
  // pre-release slot of a placeholder version.
  const parsed = semver.parse(`0.0.0-${text}`);
  if (!parsed || parsed.build.length > 0 || parsed.prerelease.join('.') !== text) {
    throw new VersionBumpError(
      'MalformedPreRelease',
      `Invalid pre-release "${text}": identifiers must be non-empty [0-9A-Za-z-] separated by "." and numeric identifiers must not have leading zeros`
    );
  }
  return { ...version, prerelease: [...parsed.prerelease] };
}

export function setBuild(version: Version, text: string): Version {
  const parsed = semver.parse(`0.0.0+${text}`);
  if (!parsed || parsed.build.join('.') !== text) {
    throw new VersionBumpError(
      'MalformedBuildMetadata',
      `Invalid build metadata "${text}": identifiers must be non-empty [0-9A-Za-z-] separated by "."`
    );
  }
  return { ...version, build: [...parsed.build] };
}

/** Full replacement; the current value plays no part. */
export function setVersion(text: string): Version {
  return parseVersion(text);
}

export function applyBump(version: Version, operation: BumpOperation): Version {
  switch (operation.kind) {
    case 'major':
      return bumpMajor(version);
    case 'minor':
      return bumpMinor(version);
    case 'patch':
      return bumpPatch(version);
    case 'pre':
      return setPreRelease(version, operation.value);
    case 'build':
      return setBuild(version, operation.value);
    case 'version':
      return setVersion(operation.value);
  }
}

/**
 * Renders one component for `read`. An absent pre-release or build label reads as "".
 */
export function readComponent(version: Version, target: ReadTarget): string {
  switch (target) {
    case 'version':
      return formatVersion(version);
    case 'major':
      return String(version.major);
    case 'minor':
      return String(version.minor);
    case 'patch':
      return String(version.patch);
    case 'pre':
      return version.prerelease.join('.');
    case 'build':
      return version.build.join('.');
  }
}
