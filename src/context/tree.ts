/**
 * Tree Builder - walks a directory and produces the filtered, ordered node tree.
 *
 * The walk uses an explicit stack so very deep trees cannot overflow the call
 * stack. A directory is attached to its parent once its own subtree is done.
 *
 * Directory policy: outside include-only mode every directory the matcher
 * keeps is listed, even if all of its files were filtered out. In include-only
 * mode a directory is listed only on the path to an included file.
 */

import { existsSync, readdirSync, statSync, type Dirent } from 'fs';
import { basename, join, resolve } from 'path';
import type { FilterConfig } from './config.js';
import {
  ConfigurationError,
  ReadError,
  errorCode,
  readFailureFromCode,
  toWarning,
  type ReadWarning,
} from './errors.js';
import { PathMatcher } from './filter.js';
import { languageFor } from './language.js';
import { parseIgnoreFile } from './patterns.js';
import { readTextFile } from './reader.js';

export interface FileNode {
  readonly kind: 'file';
  readonly name: string;
  /** POSIX path relative to the root */
  readonly path: string;
  readonly content: string;
  readonly size: number;
  readonly language: string;
}

export interface DirectoryNode {
  readonly kind: 'directory';
  readonly name: string;
  /** POSIX path relative to the root; '' for the root itself */
  readonly path: string;
  readonly children: readonly TreeNode[];
}

export type TreeNode = FileNode | DirectoryNode;

export type { ReadWarning };

export interface BuildResult {
  root: DirectoryNode;
  /** Files and directories that could not be read, in walk order */
  warnings: ReadWarning[];
}

interface Frame {
  absolutePath: string;
  relativePath: string;
  name: string;
  matcher: PathMatcher;
  entries: Dirent[];
  next: number;
  children: TreeNode[];
}

/**
 * Validate that the root exists and is a directory.
 * @returns the absolute root path
 */
export function validateRoot(rootPath: string): string {
  const abs = resolve(rootPath);

  if (!existsSync(abs)) {
    throw new ConfigurationError(`Path does not exist: ${rootPath}\nResolved to: ${abs}`);
  }

  if (!statSync(abs).isDirectory()) {
    throw new ConfigurationError(`Path is not a directory: ${rootPath}\nResolved to: ${abs}`);
  }

  return abs;
}

function compareNames(a: Dirent, b: Dirent): number {
  if (a.name < b.name) return -1;
  if (a.name > b.name) return 1;
  return 0;
}

function listDirectory(absolutePath: string, relativePath: string): Dirent[] {
  try {
    return readdirSync(absolutePath, { withFileTypes: true }).sort(compareNames);
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new ReadError(relativePath, 'unreadable-directory', `Cannot list ${relativePath}: ${detail}`, { cause: error });
  }
}

/**
 * Matcher for a subtree: the parent's, plus the rules of the subtree's own
 * ignore file if it has one. An ignore file that cannot be read is a warning.
 */
function scopedMatcher(
  parent: PathMatcher,
  config: FilterConfig,
  frame: Omit<Frame, 'matcher'>,
  warnings: ReadWarning[]
): PathMatcher {
  if (!parent.usesIgnoreFiles || frame.relativePath === '') return parent;

  const holder = frame.entries.find(e => e.name === config.ignoreFileName && (e.isFile() || e.isSymbolicLink()));
  if (!holder) return parent;

  const path = join(frame.absolutePath, holder.name);
  let text: string;
  try {
    text = readTextFile(path, `${frame.relativePath}/${holder.name}`).content;
  } catch (error) {
    if (!(error instanceof ReadError)) throw error;
    warnings.push(toWarning(error));
    return parent;
  }
  return parent.withRules(parseIgnoreFile(text, frame.relativePath, path));
}

function openFrame(
  absolutePath: string,
  relativePath: string,
  name: string,
  parent: PathMatcher,
  config: FilterConfig,
  warnings: ReadWarning[]
): Frame {
  const base: Omit<Frame, 'matcher'> = {
    absolutePath,
    relativePath,
    name,
    entries: listDirectory(absolutePath, relativePath),
    next: 0,
    children: [],
  };
  return { ...base, matcher: scopedMatcher(parent, config, base, warnings) };
}

function closeFrame(frame: Frame): DirectoryNode {
  const node: DirectoryNode = {
    kind: 'directory',
    name: frame.name,
    path: frame.relativePath,
    children: Object.freeze(frame.children),
  };
  return Object.freeze(node);
}

type EntryKind = 'file' | 'directory' | 'other';

/** Classify an entry, following a symlink one level to see what it points at. */
function entryKind(entry: Dirent, absolutePath: string, relativePath: string): EntryKind | 'symlinked-directory' {
  if (entry.isDirectory()) return 'directory';
  if (entry.isFile()) return 'file';
  if (!entry.isSymbolicLink()) return 'other';

  try {
    const target = statSync(absolutePath);
    if (target.isDirectory()) return 'symlinked-directory';
    return target.isFile() ? 'file' : 'other';
  } catch (error) {
    const reason = readFailureFromCode(errorCode(error));
    throw new ReadError(relativePath, reason, `Cannot follow symlink ${relativePath}`, { cause: error });
  }
}

/**
 * Build the filtered tree for `rootPath`.
 * Unreadable entries become warnings; only configuration problems throw.
 */
export function buildTree(rootPath: string, config: FilterConfig): BuildResult {
  const absoluteRoot = validateRoot(rootPath);
  const warnings: ReadWarning[] = [...config.warnings];

  let rootFrame: Frame;
  try {
    rootFrame = openFrame(absoluteRoot, '', basename(absoluteRoot), PathMatcher.fromConfig(config), config, warnings);
  } catch (error) {
    if (error instanceof ReadError) {
      throw new ConfigurationError(`Cannot list root directory: ${absoluteRoot}`, { cause: error });
    }
    throw error;
  }

  const stack: Frame[] = [rootFrame];
  const keepEmptyDirectories = !rootFrame.matcher.includeOnly;

  while (stack.length > 0) {
    const frame = stack[stack.length - 1];

    if (frame.next >= frame.entries.length) {
      stack.pop();
      const parent = stack.at(-1);
      if (parent) {
        const node = closeFrame(frame);
        if (keepEmptyDirectories || node.children.length > 0) parent.children.push(node);
      }
      continue;
    }

    const entry = frame.entries[frame.next++];
    const relativePath = frame.relativePath ? `${frame.relativePath}/${entry.name}` : entry.name;
    const absolutePath = join(frame.absolutePath, entry.name);

    try {
      const kind = entryKind(entry, absolutePath, relativePath);
      if (kind === 'other') continue;

      if (kind === 'symlinked-directory') {
        if (frame.matcher.decide(relativePath, true) === 'include') {
          warnings.push({
            path: relativePath,
            reason: 'symlinked-directory',
            message: `Not following symlinked directory ${relativePath}`,
          });
        }
        continue;
      }

      if (kind === 'directory') {
        if (frame.matcher.decide(relativePath, true) === 'exclude') continue;
        stack.push(openFrame(absolutePath, relativePath, entry.name, frame.matcher, config, warnings));
        continue;
      }

      if (frame.matcher.decide(relativePath, false) === 'exclude') continue;

      const { content, size } = readTextFile(absolutePath, relativePath);
      if (config.skipEmptyFiles && size === 0) continue;

      const file: FileNode = {
        kind: 'file',
        name: entry.name,
        path: relativePath,
        content,
        size,
        language: languageFor(entry.name),
      };
      frame.children.push(Object.freeze(file));
    } catch (error) {
      if (!(error instanceof ReadError)) throw error;
      // A dangling link the rules would drop anyway is not worth a warning
      if (error.reason === 'broken-symlink' && entry.isSymbolicLink()
        && frame.matcher.decide(relativePath, false) === 'exclude') continue;
      warnings.push(toWarning(error));
    }
  }

  return { root: closeFrame(rootFrame), warnings };
}

/** Files of a tree in depth-first order, the order both render passes use. */
export function collectFiles(node: DirectoryNode): FileNode[] {
  const files: FileNode[] = [];
  const pending: TreeNode[] = [node];

  while (pending.length > 0) {
    const current = pending.pop();
    if (!current) break;
    if (current.kind === 'file') {
      files.push(current);
      continue;
    }
    for (let i = current.children.length - 1; i >= 0; i--) {
      pending.push(current.children[i]);
    }
  }

  return files;
}
