/**
 * Filter configuration: the read-only rule bundle for one run.
 */

import { existsSync, lstatSync, readFileSync, statSync } from 'fs';
import { join, resolve } from 'path';
import { ConfigurationError, ReadError, toWarning, type ReadWarning } from './errors.js';
import { cliRules, ignorePatternRules, parseIgnoreFile, type Rule } from './patterns.js';
import { readTextFile } from './reader.js';

export const DEFAULT_IGNORE_FILE_NAME = '.gitignore';

export interface FilterInput {
  /** Traversal root; the default ignore file is looked up here */
  rootPath: string;
  /** Glob patterns excluding files by name or relative path */
  excludeFiles?: string[];
  /** Glob patterns excluding directories (and everything under them) */
  excludeDirs?: string[];
  /** Non-empty list switches on include-only mode */
  include?: string[];
  skipEmptyFiles?: boolean;
  /** Skip ignore-file rules entirely */
  ignoreIgnoreFile?: boolean;
  /** Ignore file to load instead of the one at the root */
  ignoreFile?: string;
  /** Ignore file applied before the project's own (lower precedence) */
  globalIgnore?: string;
  /** Gitignore-style patterns applied after the ignore files, even when those are disabled */
  ignorePatterns?: string[];
  /** Name of the ignore file picked up at the root and in nested directories (default: .gitignore) */
  ignoreFileName?: string;
}

export interface FilterConfig {
  /** Rules loaded from ignore files */
  readonly ignoreRules: readonly Rule[];
  /** `--ignore` patterns, evaluated after `ignoreRules` */
  readonly extraIgnoreRules: readonly Rule[];
  readonly excludeFileRules: readonly Rule[];
  readonly excludeDirRules: readonly Rule[];
  readonly includeRules: readonly Rule[];
  readonly skipEmptyFiles: boolean;
  readonly ignoreIgnoreFile: boolean;
  readonly ignoreFileName: string;
  /** Ignore files that were found but could not be read */
  readonly warnings: readonly ReadWarning[];
}

/** An ignore file named on the command line or in the config file: it must load. */
function loadIgnoreFile(path: string): Rule[] {
  const absolutePath = resolve(path);

  if (!existsSync(absolutePath)) {
    throw new ConfigurationError(`Ignore file not found: ${absolutePath}`);
  }
  if (!statSync(absolutePath).isFile()) {
    throw new ConfigurationError(`Ignore file is not a regular file: ${absolutePath}`);
  }

  let text: string;
  try {
    text = readFileSync(absolutePath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Failed to read ignore file: ${absolutePath}`, { cause: error });
  }

  return parseIgnoreFile(text, '', absolutePath);
}

/**
 * The root's own ignore file, if it has one. A file that is there but cannot
 * be read becomes a warning; its patterns must still be well-formed.
 */
function discoverIgnoreFile(rootPath: string, name: string, warnings: ReadWarning[]): Rule[] {
  const absolutePath = join(resolve(rootPath), name);
  const entry = lstatSync(absolutePath, { throwIfNoEntry: false });
  if (!entry || !(entry.isFile() || entry.isSymbolicLink())) return [];

  try {
    return parseIgnoreFile(readTextFile(absolutePath, name).content, '', absolutePath);
  } catch (error) {
    if (!(error instanceof ReadError)) throw error;
    warnings.push(toWarning(error));
    return [];
  }
}

/**
 * Resolve external input into a frozen FilterConfig.
 * Throws ConfigurationError on malformed patterns, missing explicit ignore
 * files, or flags that contradict each other.
 */
export function createFilterConfig(input: FilterInput): FilterConfig {
  const ignoreIgnoreFile = input.ignoreIgnoreFile ?? false;

  if (ignoreIgnoreFile && (input.ignoreFile || input.globalIgnore)) {
    throw new ConfigurationError(
      'Conflicting options: ignore files are disabled but an ignore file was given'
    );
  }

  const ignoreFileName = input.ignoreFileName ?? DEFAULT_IGNORE_FILE_NAME;
  if (ignoreFileName === '' || ignoreFileName.includes('/') || ignoreFileName.includes('\\')) {
    throw new ConfigurationError(`Ignore file name must be a plain file name: "${ignoreFileName}"`);
  }

  const ignoreRules: Rule[] = [];
  const warnings: ReadWarning[] = [];
  if (!ignoreIgnoreFile) {
    if (input.globalIgnore) ignoreRules.push(...loadIgnoreFile(input.globalIgnore));
    if (input.ignoreFile) {
      ignoreRules.push(...loadIgnoreFile(input.ignoreFile));
    } else {
      ignoreRules.push(...discoverIgnoreFile(input.rootPath, ignoreFileName, warnings));
    }
  }

  return Object.freeze({
    ignoreRules: Object.freeze(ignoreRules),
    extraIgnoreRules: Object.freeze(ignorePatternRules(input.ignorePatterns ?? [])),
    excludeFileRules: Object.freeze(cliRules(input.excludeFiles ?? [], 'cli-exclude-file')),
    excludeDirRules: Object.freeze(cliRules(input.excludeDirs ?? [], 'cli-exclude-dir')),
    includeRules: Object.freeze(cliRules(input.include ?? [], 'cli-include')),
    skipEmptyFiles: input.skipEmptyFiles ?? false,
    ignoreIgnoreFile,
    ignoreFileName,
    warnings: Object.freeze(warnings),
  });
}
