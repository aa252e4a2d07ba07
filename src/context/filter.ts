/**
 * Path Matcher - decides, for one relative path, whether it is kept.
 *
 * Precedence:
 * 1. include-only mode: only include-pattern matches survive
 * 2. explicit exclude-file / exclude-dir patterns
 * 3. ignore-file rules and `--ignore` patterns, evaluated in order
 *    (last match wins, `!` re-includes)
 * 4. default include
 *
 * `.git` is never part of the output, whatever the rules say.
 */

import ignorePkg, { type Ignore } from 'ignore';
import type { FilterConfig } from './config.js';
import { ruleLine, type Rule } from './patterns.js';

// `ignore` is CommonJS; under NodeNext its factory is reached through `.default`
const createIgnore = ignorePkg.default;
const { isPathValid } = ignorePkg.default;

export type Decision = 'include' | 'exclude';

/** Ignore-file rules that share one originating directory */
interface IgnoreLayer {
  base: string;
  matcher: Ignore;
}

const ALWAYS_EXCLUDE_SEGMENT = '.git';

function compile(rules: readonly Rule[]): Ignore | null {
  if (rules.length === 0) return null;
  return createIgnore({ ignorecase: false }).add(rules.map(ruleLine));
}

/**
 * Exclude-file patterns judge the file itself, never a parent directory:
 * `!*\/` re-includes every directory before the walk reaches the file.
 */
function compileFileOnly(rules: readonly Rule[]): Ignore | null {
  if (rules.length === 0) return null;
  return createIgnore({ ignorecase: false }).add([...rules.map(ruleLine), '!*/']);
}

/**
 * Group consecutive rules by base, keeping file order.
 */
function compileLayers(rules: readonly Rule[]): IgnoreLayer[] {
  const layers: IgnoreLayer[] = [];
  let start = 0;

  for (let i = 1; i <= rules.length; i++) {
    if (i < rules.length && rules[i].base === rules[start].base) continue;
    const group = rules.slice(start, i);
    const matcher = compile(group);
    if (matcher) layers.push({ base: rules[start].base, matcher });
    start = i;
  }

  return layers;
}

/** Path relative to `base`, or null if it does not live under it. */
function relativeTo(base: string, relativePath: string): string | null {
  if (base === '') return relativePath;
  if (!relativePath.startsWith(`${base}/`)) return null;
  return relativePath.slice(base.length + 1);
}

/**
 * `ignore` refuses paths starting with a dot-only segment (`...`, `.../x`).
 * Those are matched by their last segment, or not at all.
 */
function matchable(candidate: string): string | null {
  if (isPathValid(candidate)) return candidate;
  const slash = candidate.endsWith('/') ? '/' : '';
  const trimmed = slash ? candidate.slice(0, -1) : candidate;
  const name = `${trimmed.slice(trimmed.lastIndexOf('/') + 1)}${slash}`;
  return isPathValid(name) ? name : null;
}

function isGitPath(relativePath: string): boolean {
  return relativePath.split('/').includes(ALWAYS_EXCLUDE_SEGMENT);
}

export class PathMatcher {
  private constructor(
    private readonly config: FilterConfig,
    private readonly layers: readonly IgnoreLayer[],
    private readonly include: Ignore | null,
    private readonly excludeFiles: Ignore | null,
    private readonly excludeDirs: Ignore | null,
  ) {}

  static fromConfig(config: FilterConfig): PathMatcher {
    return new PathMatcher(
      config,
      compileLayers([...(config.ignoreIgnoreFile ? [] : config.ignoreRules), ...config.extraIgnoreRules]),
      compile(config.includeRules),
      compileFileOnly(config.excludeFileRules),
      compile(config.excludeDirRules),
    );
  }

  /** True when a non-empty include list restricts output to its matches */
  get includeOnly(): boolean {
    return this.include !== null;
  }

  /** True when ignore-file rules take part in decisions */
  get usesIgnoreFiles(): boolean {
    return !this.config.ignoreIgnoreFile && !this.includeOnly;
  }

  /**
   * A matcher with extra ignore-file rules appended (e.g. a nested ignore file).
   * This matcher is left untouched.
   */
  withRules(rules: readonly Rule[]): PathMatcher {
    if (rules.length === 0) return this;
    return new PathMatcher(
      this.config,
      [...this.layers, ...compileLayers(rules)],
      this.include,
      this.excludeFiles,
      this.excludeDirs,
    );
  }

  /**
   * @param relativePath POSIX path relative to the traversal root, never empty
   */
  decide(relativePath: string, isDirectory: boolean): Decision {
    if (isGitPath(relativePath)) return 'exclude';

    const candidate = matchable(isDirectory ? `${relativePath}/` : relativePath);

    if (this.include) {
      // Directories are walked so deeper matches can be found
      if (isDirectory) return 'include';
      return candidate !== null && this.include.ignores(candidate) ? 'include' : 'exclude';
    }

    const explicit = isDirectory ? this.excludeDirs : this.excludeFiles;
    if (explicit && candidate !== null && explicit.ignores(candidate)) return 'exclude';

    let verdict: Decision = 'include';
    for (const layer of this.layers) {
      const local = relativeTo(layer.base, relativePath);
      if (local === null) continue;

      const target = matchable(isDirectory ? `${local}/` : local);
      if (target === null) continue;

      const result = layer.matcher.test(target);
      if (result.ignored) verdict = 'exclude';
      else if (result.unignored) verdict = 'include';
    }
    return verdict;
  }
}
