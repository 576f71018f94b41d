import * as fs from 'fs';
import * as path from 'path';
import { isDeepStrictEqual } from 'util';
import * as TOML from '@iarna/toml';
import { Logger } from '../utils/logger';
import { VersionBumpError } from '../utils/errors';

export const PACKAGE_TABLE = 'package';
export const VERSION_KEY = 'version';

/**
 * A manifest held in memory: the raw text, which is what gets written back,
 * and its parsed TOML tree, which is what gets queried.
 */
export interface ManifestDocument {
  readonly content: string;
  readonly data: Record<string, unknown>;
}

const TABLE_HEADER = /^\s*\[\s*([^[\]]+?)\s*\]\s*(?:#[^\n]*)?$/;
const ARRAY_TABLE_HEADER = /^\s*\[\[/;
// Single-line basic or literal string only; multi-line strings do not match.
const VERSION_ENTRY =
  /^(\s*(?:version|"version"|'version')\s*=\s*)("(?!"")(?:[^"\\\n]|\\.)*"|'(?!'')[^'\n]*')(\s*(?:#[^\n]*)?)$/;

function isTable(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function unquoteKey(key: string): string {
  return key.replace(/^(["'])(.*)\1$/, '$2');
}

interface TomlSyntaxError {
  message: string;
  line: number;
  col: number;
}

// `@iarna/toml` throws errors carrying the zero-based position of the offending character.
function isTomlSyntaxError(error: unknown): error is TomlSyntaxError {
  return (
    error instanceof Error &&
    'line' in error &&
    typeof error.line === 'number' &&
    'col' in error &&
    typeof error.col === 'number'
  );
}

function parseToml(content: string, source: string): Record<string, unknown> {
  let data: unknown;
  try {
    data = TOML.parse(content);
  } catch (error) {
    if (isTomlSyntaxError(error)) {
      // The message repeats the position and appends a code frame; keep only the reason.
      const reason = error.message.split('\n')[0].replace(/ at row \d+, col \d+, pos \d+:$/, '');
      throw new VersionBumpError(
        'ManifestParseError',
        `Invalid TOML in ${source} at line ${error.line + 1}, column ${error.col + 1}: ${reason}`,
        { cause: error }
      );
    }
    throw new VersionBumpError(
      'ManifestParseError',
      `Invalid TOML in ${source}: ${error instanceof Error ? error.message : String(error)}`,
      { cause: error }
    );
  }

  if (!isTable(data)) {
    throw new VersionBumpError('ManifestParseError', `Invalid TOML in ${source}: expected a table at the top level`);
  }
  return data;
}

type MultilineDelimiter = '"""' | "'''";

/** What is still open at the end of a line: a multi-line string, or arrays. */
interface ScanState {
  multiline: MultilineDelimiter | null;
  arrayDepth: number;
}

function skipString(line: string, start: number): number {
  const quote = line[start];
  let i = start + 1;
  while (i < line.length) {
    if (quote === '"' && line[i] === '\\') {
      i += 2;
    } else if (line[i] === quote) {
      return i + 1;
    } else {
      i++;
    }
  }
  return line.length;
}

// Returns the index after the closing delimiter, or -1 when the string continues on the next line.
function findMultilineEnd(line: string, start: number, delimiter: MultilineDelimiter): number {
  let i = start;
  while (i < line.length) {
    if (delimiter === '"""' && line[i] === '\\') {
      i += 2;
    } else if (line.startsWith(delimiter, i)) {
      // Up to two quotes right before the delimiter belong to the string.
      let end = i + 3;
      while (end < line.length && line[end] === delimiter[0] && end - i < 5) {
        end++;
      }
      return end;
    } else {
      i++;
    }
  }
  return -1;
}

function scanLine(line: string, state: ScanState): void {
  let i = 0;
  while (i < line.length) {
    if (state.multiline !== null) {
      const end = findMultilineEnd(line, i, state.multiline);
      if (end < 0) {
        return;
      }
      state.multiline = null;
      i = end;
      continue;
    }

    const ch = line[i];
    if (ch === '#') {
      return;
    }
    if (line.startsWith('"""', i)) {
      state.multiline = '"""';
      i += 3;
    } else if (line.startsWith("'''", i)) {
      state.multiline = "'''";
      i += 3;
    } else if (ch === '"' || ch === "'") {
      i = skipString(line, i);
    } else {
      if (ch === '[') {
        state.arrayDepth++;
      } else if (ch === ']' && state.arrayDepth > 0) {
        state.arrayDepth--;
      }
      i++;
    }
  }
}

function errorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/**
 * Reads and rewrites the `version` field of the `[package]` table of a TOML manifest.
 * Only that one value is ever changed; the rest of the file is written back byte for byte.
 */
export class ManifestAccessor {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  public load(manifestPath: string): ManifestDocument {
    let content: string;
    try {
      content = fs.readFileSync(manifestPath, 'utf-8');
    } catch (error) {
      const code = errorCode(error);
      const reason = code === 'ENOENT' || code === 'ENOTDIR' ? 'file does not exist' :
        code === 'EISDIR' ? 'path is a directory' :
        error instanceof Error ? error.message : String(error);
      throw new VersionBumpError('ManifestNotFound', `Could not read manifest ${manifestPath}: ${reason}`, { cause: error });
    }

    const data = parseToml(content, manifestPath);

    this.logger.debug(`Loaded manifest ${manifestPath} (${content.length} bytes)`);
    return { content, data };
  }

  public getVersion(doc: ManifestDocument): string {
    const pkg = doc.data[PACKAGE_TABLE];
    if (!isTable(pkg)) {
      throw new VersionBumpError('VersionFieldMissing', `Manifest has no [${PACKAGE_TABLE}] table`);
    }

    const version = pkg[VERSION_KEY];
    if (version === undefined) {
      throw new VersionBumpError('VersionFieldMissing', `Manifest has no ${PACKAGE_TABLE}.${VERSION_KEY} field`);
    }
    if (typeof version !== 'string') {
      throw new VersionBumpError('VersionFieldMissing', `Manifest field ${PACKAGE_TABLE}.${VERSION_KEY} is not a string`);
    }
    return version;
  }

  /**
   * Returns a copy of `doc` whose `package.version` holds `version`.
   * The quoting style, any trailing comment and the line ending of that line are kept.
   * Lines inside multi-line strings and arrays are never taken for headers or keys.
   */
  public setVersion(doc: ManifestDocument, version: string): ManifestDocument {
    const lines = doc.content.split('\n');
    const state: ScanState = { multiline: null, arrayDepth: 0 };
    let currentTable: string | null = null;

    for (let i = 0; i < lines.length; i++) {
      const line = lines[i];

      if (state.multiline === null && state.arrayDepth === 0) {
        if (ARRAY_TABLE_HEADER.test(line)) {
          currentTable = null;
          continue;
        }

        const header = TABLE_HEADER.exec(line);
        if (header) {
          currentTable = unquoteKey(header[1]);
          continue;
        }

        const entry = currentTable === PACKAGE_TABLE ? VERSION_ENTRY.exec(line) : null;
        if (entry) {
          const [, prefix, quoted, rest] = entry;
          const quote = quoted.startsWith("'") ? "'" : '"';
          lines[i] = `${prefix}${quote}${version}${quote}${rest}`;
          const content = lines.join('\n');
          return { content, data: this.verifyEdit(doc, content, version) };
        }
      }

      scanLine(line, state);
    }

    throw new VersionBumpError(
      'ManifestParseError',
      `Could not locate a single-line ${PACKAGE_TABLE}.${VERSION_KEY} string to rewrite in the manifest`
    );
  }

  /**
   * Re-parses the edited text; it must equal the original tree except for `package.version`.
   */
  private verifyEdit(doc: ManifestDocument, content: string, version: string): Record<string, unknown> {
    const updated = parseToml(content, 'the rewritten manifest');
    const expected = parseToml(doc.content, 'the manifest');
    const pkg = expected[PACKAGE_TABLE];
    if (isTable(pkg)) {
      pkg[VERSION_KEY] = version;
    }

    if (!isDeepStrictEqual(updated, expected)) {
      throw new VersionBumpError(
        'ManifestParseError',
        `Rewriting ${PACKAGE_TABLE}.${VERSION_KEY} in place would change other values of the manifest`
      );
    }
    return updated;
  }

  /**
   * Writes to a temporary file beside the manifest and renames it into place,
   * so an interrupted write never leaves a truncated manifest behind.
   */
  public save(doc: ManifestDocument, manifestPath: string): void {
    const target = this.resolveTarget(manifestPath);
    const tempPath = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);

    try {
      const mode = fs.existsSync(target) ? fs.statSync(target).mode : undefined;
      fs.writeFileSync(tempPath, doc.content, { encoding: 'utf-8', mode });
      fs.renameSync(tempPath, target);
    } catch (error) {
      fs.rmSync(tempPath, { force: true });
      throw new VersionBumpError(
        'WriteError',
        `Failed to write manifest ${manifestPath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    this.logger.debug(`Wrote manifest ${target}`);
  }

  private resolveTarget(manifestPath: string): string {
    try {
      return fs.realpathSync(manifestPath);
    } catch (error) {
      if (errorCode(error) === 'ENOENT') {
        return path.resolve(manifestPath);
      }
      throw new VersionBumpError(
        'WriteError',
        `Failed to resolve manifest path ${manifestPath}: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }
  }
}

