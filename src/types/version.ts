/** A version component that `read` can print. */
export type ReadTarget = 'version' | 'major' | 'minor' | 'patch' | 'pre' | 'build';

export const READ_TARGETS: readonly ReadTarget[] = ['version', 'major', 'minor', 'patch', 'pre', 'build'];

/** The single change `bump` applies to the current version. */
export type BumpOperation =
  | { kind: 'major' }
  | { kind: 'minor' }
  | { kind: 'patch' }
  | { kind: 'pre'; value: string }
  | { kind: 'build'; value: string }
  | { kind: 'version'; value: string };

export type BumpKind = BumpOperation['kind'];

export const BUMP_KINDS: readonly BumpKind[] = ['version', 'major', 'minor', 'patch', 'pre', 'build'];
