import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, rmSync, symlinkSync, writeFileSync } from 'fs';
import { basename, join } from 'path';
import {
  buildTree,
  collectFiles,
  createFilterConfig,
  ConfigurationError,
  PathMatcher,
} from '../../../src/context/index.js';
import type { DirectoryNode, FilterInput, TreeNode } from '../../../src/context/index.js';
import { createFixture, writeFiles } from '../../helpers/fixture.js';

// ── Helpers ─────────────────────────────────────────────────────────────────

function names(node: DirectoryNode): string[] {
  return node.children.map(c => (c.kind === 'directory' ? `${c.name}/` : c.name));
}

function child(node: DirectoryNode, name: string): TreeNode {
  const found = node.children.find(c => c.name === name);
  if (!found) throw new Error(`No child named ${name}`);
  return found;
}

function dir(node: DirectoryNode, name: string): DirectoryNode {
  const found = child(node, name);
  if (found.kind !== 'directory') throw new Error(`${name} is not a directory`);
  return found;
}

function build(root: string, input: Omit<FilterInput, 'rootPath'> = {}) {
  return buildTree(root, createFilterConfig({ rootPath: root, ...input }));
}

// ── Tests ───────────────────────────────────────────────────────────────────

describe('buildTree', () => {
  let root: string;

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
  });

  describe('ordering', () => {
    it('sorts by code unit, directories and files interleaved', () => {
      root = createFixture('tree-sort');
      writeFiles(root, { 'b.txt': 'b', 'B.txt': 'B', 'a/x.txt': 'x', 'c/y.txt': 'y' });

      const { root: tree } = build(root);
      expect(tree.name).toBe(basename(root));
      expect(tree.path).toBe('');
      expect(names(tree)).toEqual(['B.txt', 'a/', 'b.txt', 'c/']);
    });

    it('records relative paths, content, size and language', () => {
      root = createFixture('tree-file');
      writeFiles(root, { 'src/app.ts': 'export {};\n' });

      const file = child(dir(build(root).root, 'src'), 'app.ts');
      expect(file).toEqual({
        kind: 'file',
        name: 'app.ts',
        path: 'src/app.ts',
        content: 'export {};\n',
        size: 11,
        language: 'typescript',
      });
    });
  });

  describe('directories', () => {
    it('lists a directory whose files were all ignored', () => {
      root = createFixture('tree-empty-dir');
      writeFiles(root, { '.gitignore': '*.log\n', 'logs/a.log': 'a' });

      const { root: tree } = build(root);
      expect(names(tree)).toEqual(['.gitignore', 'logs/']);
      expect(dir(tree, 'logs').children).toEqual([]);
    });

    it('lists an empty directory', () => {
      root = createFixture('tree-bare-dir');
      writeFiles(root, { 'empty/': '' });
      expect(names(build(root).root)).toEqual(['empty/']);
    });

    it('drops directories without included files in include-only mode', () => {
      root = createFixture('tree-include');
      writeFiles(root, { 'docs/a.md': '# A\n', 'src/b.ts': 'b', 'empty/': '' });

      const { root: tree } = build(root, { include: ['**/*.md'] });
      expect(names(tree)).toEqual(['docs/']);
      expect(names(dir(tree, 'docs'))).toEqual(['a.md']);
    });
  });

  describe('pruning', () => {
    it('never visits an excluded directory', () => {
      root = createFixture('tree-prune');
      writeFiles(root, {
        '.gitignore': 'vendor/\n',
        // Both would fail if the directory were walked
        'vendor/.gitignore': '[bad\n',
        'vendor/blob.bin': new Uint8Array([0x61, 0x00, 0x62]),
      });

      const { root: tree, warnings } = build(root);
      expect(names(tree)).toEqual(['.gitignore']);
      expect(warnings).toEqual([]);
    });

    it('cannot re-include a file below an excluded directory', () => {
      root = createFixture('tree-dir-negation');
      writeFiles(root, {
        '.gitignore': 'logs/\n!logs/keep.log\n',
        'logs/keep.log': 'keep',
        'logs/a.log': 'a',
      });

      expect(names(build(root).root)).toEqual(['.gitignore']);
    });

    it('re-includes a file when only the directory contents are excluded', () => {
      root = createFixture('tree-star-negation');
      writeFiles(root, {
        '.gitignore': 'logs/*\n!logs/keep.log\n',
        'logs/keep.log': 'keep',
        'logs/a.log': 'a',
      });

      const { root: tree } = build(root);
      expect(names(tree)).toEqual(['.gitignore', 'logs/']);
      expect(names(dir(tree, 'logs'))).toEqual(['keep.log']);
    });

    it('skips .git', () => {
      root = createFixture('tree-git');
      writeFiles(root, { '.git/HEAD': 'ref: refs/heads/main\n', 'a.txt': 'a' });
      expect(names(build(root).root)).toEqual(['a.txt']);
    });

    it('applies exclude-dir patterns', () => {
      root = createFixture('tree-exclude-dir');
      writeFiles(root, { 'node_modules/x/index.js': 'x', 'src/node_modules/y.js': 'y', 'src/a.js': 'a' });

      const { root: tree } = build(root, { excludeDirs: ['node_modules'] });
      expect(names(tree)).toEqual(['src/']);
      expect(names(dir(tree, 'src'))).toEqual(['a.js']);
    });
  });

  describe('dot-only names', () => {
    it('are walked when the root has ignore rules', () => {
      root = createFixture('tree-dots-ignore');
      writeFiles(root, { '.gitignore': '*.log\n', '...': 'dots', '..../a.log': 'a', '..../b.txt': 'b' });

      const { root: tree } = build(root);
      expect(names(tree)).toEqual(['...', '..../', '.gitignore']);
      expect(names(dir(tree, '....'))).toEqual(['b.txt']);
    });

    it('are walked in include-only mode', () => {
      root = createFixture('tree-dots-include');
      writeFiles(root, { '.../x.md': '# X\n', '.../y.ts': 'y' });

      const files = collectFiles(build(root, { include: ['**/*.md'] }).root);
      expect(files.map(f => f.path)).toEqual(['.../x.md']);
    });

    it('are walked under a nested ignore file', () => {
      root = createFixture('tree-dots-nested');
      writeFiles(root, { 'sub/.gitignore': '*.tmp\n', 'sub/...': 'dots', 'sub/a.tmp': 'a' });

      expect(names(dir(build(root).root, 'sub'))).toEqual(['...', '.gitignore']);
    });
  });

  describe('explicit excludes', () => {
    it('drop files by name without dropping same-named directories', () => {
      root = createFixture('tree-exclude-file');
      writeFiles(root, { 'docs/a.md': 'a', 'b.md': 'b', 'notes/docs': 'd' });

      const { root: tree } = build(root, { excludeFiles: ['docs'] });
      expect(collectFiles(tree).map(f => f.path)).toEqual(['b.md', 'docs/a.md']);
      expect(names(dir(tree, 'notes'))).toEqual([]);
    });

    it('apply --ignore patterns even with ignore files disabled', () => {
      root = createFixture('tree-ignore-patterns');
      writeFiles(root, { '.gitignore': '*.txt\n', 'a.tmp': 'a', 'keep.tmp': 'k', 'b.txt': 'b' });

      const { root: tree } = build(root, { ignoreIgnoreFile: true, ignorePatterns: ['*.tmp', '!keep.tmp'] });
      expect(names(tree)).toEqual(['.gitignore', 'b.txt', 'keep.tmp']);
    });
  });

  describe('nested ignore files', () => {
    it('apply to their own subtree only', () => {
      root = createFixture('tree-nested');
      writeFiles(root, { 'sub/.gitignore': '*.tmp\n', 'sub/a.tmp': 'a', 'sub/b.txt': 'b', 'top.tmp': 't' });

      const { root: tree } = build(root);
      expect(names(tree)).toEqual(['sub/', 'top.tmp']);
      expect(names(dir(tree, 'sub'))).toEqual(['.gitignore', 'b.txt']);
    });

    it('can re-include what the root ignore file excludes', () => {
      root = createFixture('tree-nested-negation');
      writeFiles(root, {
        '.gitignore': '*.log\n',
        'sub/.gitignore': '!keep.log\n',
        'sub/keep.log': 'k',
        'sub/drop.log': 'd',
        'keep.log': 'k',
      });

      const { root: tree } = build(root);
      expect(names(tree)).toEqual(['.gitignore', 'sub/']);
      expect(names(dir(tree, 'sub'))).toEqual(['.gitignore', 'keep.log']);
    });

    it('are not loaded when ignore files are disabled', () => {
      root = createFixture('tree-nested-off');
      writeFiles(root, { 'sub/.gitignore': '*.tmp\n', 'sub/a.tmp': 'a', 'sub/b.txt': 'b' });

      const { root: tree } = build(root, { ignoreIgnoreFile: true });
      expect(names(dir(tree, 'sub'))).toEqual(['.gitignore', 'a.tmp', 'b.txt']);
    });

    it('use the configured file name', () => {
      root = createFixture('tree-nested-name');
      writeFiles(root, { 'sub/.ctxignore': '*.tmp\n', 'sub/a.tmp': 'a', 'sub/b.txt': 'b' });

      const { root: tree } = build(root, { ignoreFileName: '.ctxignore' });
      expect(names(dir(tree, 'sub'))).toEqual(['.ctxignore', 'b.txt']);
    });

    it('warn and fall back to the parent rules when unreadable', () => {
      root = createFixture('tree-nested-unreadable');
      writeFiles(root, { '.gitignore': '*.log\n', 'sub/a.log': 'a', 'sub/b.tmp': 'b' });
      symlinkSync(join(root, 'missing'), join(root, 'sub', '.gitignore'));

      const { root: tree, warnings } = build(root);
      expect(names(dir(tree, 'sub'))).toEqual(['b.tmp']);
      expect(warnings).toEqual([
        { path: 'sub/.gitignore', reason: 'broken-symlink', message: expect.stringMatching(/^Cannot read sub\/\.gitignore: /) },
        { path: 'sub/.gitignore', reason: 'broken-symlink', message: 'Cannot follow symlink sub/.gitignore' },
      ]);
    });

    it('throw on a malformed rule', () => {
      root = createFixture('tree-nested-bad');
      writeFiles(root, { 'sub/.gitignore': 'ok\n[bad\n' });

      expect(() => build(root)).toThrow(
        `Invalid pattern in ${join(root, 'sub', '.gitignore')}:2: pattern "[bad": unterminated character class "["`
      );
    });
  });

  describe('root ignore file', () => {
    it('is a warning when it cannot be read', () => {
      root = createFixture('tree-root-unreadable');
      writeFiles(root, { 'a.log': 'a' });
      symlinkSync(join(root, 'missing'), join(root, '.gitignore'));

      const { root: tree, warnings } = build(root);
      expect(names(tree)).toEqual(['a.log']);
      expect(warnings.map(w => [w.path, w.reason])).toEqual([
        ['.gitignore', 'broken-symlink'],
        ['.gitignore', 'broken-symlink'],
      ]);
    });
  });

  describe('empty files', () => {
    it('keeps empty files by default', () => {
      root = createFixture('tree-empty-keep');
      writeFiles(root, { 'empty.txt': '', 'full.txt': 'x' });

      const { root: tree } = build(root);
      expect(names(tree)).toEqual(['empty.txt', 'full.txt']);
      expect(child(tree, 'empty.txt')).toMatchObject({ content: '', size: 0 });
    });

    it('omits empty files with skipEmptyFiles', () => {
      root = createFixture('tree-empty-skip');
      writeFiles(root, { 'empty.txt': '', 'full.txt': 'x' });
      expect(names(build(root, { skipEmptyFiles: true }).root)).toEqual(['full.txt']);
    });
  });

  describe('read failures', () => {
    it('turns binary content into a warning', () => {
      root = createFixture('tree-binary');
      writeFiles(root, { 'bin.dat': new Uint8Array([0x61, 0x00, 0x62]), 'ok.txt': 'ok' });

      const { root: tree, warnings } = build(root);
      expect(names(tree)).toEqual(['ok.txt']);
      expect(warnings).toEqual([
        { path: 'bin.dat', reason: 'binary', message: 'Skipping binary file bin.dat' },
      ]);
    });

    it('turns invalid UTF-8 into a warning', () => {
      root = createFixture('tree-utf8');
      writeFiles(root, { 'sub/bad.txt': new Uint8Array([0xc3, 0x28]) });

      const { root: tree, warnings } = build(root);
      expect(names(dir(tree, 'sub'))).toEqual([]);
      expect(warnings).toEqual([
        { path: 'sub/bad.txt', reason: 'binary', message: 'Skipping non-UTF-8 file sub/bad.txt' },
      ]);
    });

    it('warns about a broken symlink', () => {
      root = createFixture('tree-dangling');
      symlinkSync(join(root, 'missing'), join(root, 'dangling'));

      const { root: tree, warnings } = build(root);
      expect(names(tree)).toEqual([]);
      expect(warnings).toEqual([
        { path: 'dangling', reason: 'broken-symlink', message: 'Cannot follow symlink dangling' },
      ]);
    });

    it('stays quiet about a broken symlink the rules exclude', () => {
      root = createFixture('tree-dangling-ignored');
      writeFiles(root, { '.gitignore': 'dangling\n' });
      symlinkSync(join(root, 'missing'), join(root, 'dangling'));

      expect(build(root).warnings).toEqual([]);
    });

    it('does not follow a symlinked directory', () => {
      root = createFixture('tree-link-dir');
      writeFiles(root, { 'real/f.txt': 'f' });
      symlinkSync(join(root, 'real'), join(root, 'link'));

      const { root: tree, warnings } = build(root);
      expect(names(tree)).toEqual(['real/']);
      expect(warnings).toEqual([
        { path: 'link', reason: 'symlinked-directory', message: 'Not following symlinked directory link' },
      ]);
    });

    it('follows a symlink to a file', () => {
      root = createFixture('tree-link-file');
      writeFiles(root, { 'a.txt': 'hello' });
      symlinkSync(join(root, 'a.txt'), join(root, 'b.txt'));

      const { root: tree } = build(root);
      expect(names(tree)).toEqual(['a.txt', 'b.txt']);
      expect(child(tree, 'b.txt')).toMatchObject({ path: 'b.txt', content: 'hello' });
    });
  });

  describe('root validation', () => {
    it('throws for a missing root', () => {
      root = createFixture('tree-missing');
      const missing = join(root, 'nope');
      expect(() => build(missing)).toThrow(ConfigurationError);
      expect(() => build(missing)).toThrow(`Path does not exist: ${missing}`);
    });

    it('throws for a root that is a file', () => {
      root = createFixture('tree-root-file');
      writeFiles(root, { 'a.txt': 'a' });
      expect(() => build(join(root, 'a.txt'))).toThrow(`Path is not a directory: ${join(root, 'a.txt')}`);
    });
  });

  it('freezes the nodes it returns', () => {
    root = createFixture('tree-frozen');
    writeFiles(root, { 'sub/a.txt': 'a' });

    const { root: tree } = build(root);
    const sub = dir(tree, 'sub');
    expect(Object.isFrozen(tree)).toBe(true);
    expect(Object.isFrozen(tree.children)).toBe(true);
    expect(Object.isFrozen(sub)).toBe(true);
    expect(Object.isFrozen(child(sub, 'a.txt'))).toBe(true);
  });

  it('walks very deep trees', () => {
    root = createFixture('tree-deep');
    const depth = 300;
    const segments = Array.from({ length: depth }, () => 'd');
    const deepest = join(root, ...segments);
    mkdirSync(deepest, { recursive: true });
    writeFileSync(join(deepest, 'leaf.txt'), 'leaf');

    const files = collectFiles(build(root).root);
    expect(files.map(f => f.path)).toEqual([`${segments.join('/')}/leaf.txt`]);
  });
});

describe('collectFiles', () => {
  let root: string;

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
  });

  it('returns files in depth-first tree order', () => {
    root = createFixture('collect');
    writeFiles(root, { 'z.txt': 'z', 'a/b/c.txt': 'c', 'a/a.txt': 'a', 'm.txt': 'm' });

    const files = collectFiles(build(root).root);
    expect(files.map(f => f.path)).toEqual(['a/a.txt', 'a/b/c.txt', 'm.txt', 'z.txt']);
  });
});

// ── Filter property ─────────────────────────────────────────────────────────

function seededRandom(seed: number): () => number {
  let state = seed;
  return () => {
    state = (state + 0x6d2b79f5) | 0;
    let t = Math.imul(state ^ (state >>> 15), 1 | state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

const DIR_NAMES = ['src', 'docs', 'logs', 'build', 'lib'];
const FILE_NAMES = ['a.ts', 'b.md', 'c.log', 'keep.log', 'README.md', 'notes.txt'];
const IGNORE_POOL = ['*.log', '!keep.log', 'build/', 'docs/*.md', '/README.md', 'logs/', 'logs/*', 'src/**/b.md', '!src/'];
const EXCLUDE_FILE_POOL = ['a.ts', 'docs/b.md', 'docs', '*.txt'];
const EXCLUDE_DIR_POOL = ['build', 'src/lib', 'docs'];
const INCLUDE_POOL = ['**/*.md', 'src/', '*.ts', 'logs/keep.log'];

describe('filter property', () => {
  const cleanup: string[] = [];

  afterEach(() => {
    for (const path of cleanup.splice(0)) rmSync(path, { recursive: true, force: true });
  });

  const seeds = Array.from({ length: 24 }, (_, i) => i + 1);

  it.each(seeds)('a file is in the tree iff it and its directories are included (seed %i)', seed => {
    const random = seededRandom(seed);
    const pick = <T>(items: readonly T[]): T => items[Math.floor(random() * items.length)];
    const some = <T>(items: readonly T[], max: number): T[] =>
      Array.from({ length: Math.floor(random() * (max + 1)) }, () => pick(items));

    const root = createFixture(`property-${seed}`);
    const rules = createFixture(`property-${seed}-rules`);
    cleanup.push(root, rules);

    const paths = new Set<string>();
    for (let i = 0; i < 14; i++) {
      const dirs = Array.from({ length: Math.floor(random() * 4) }, () => pick(DIR_NAMES));
      paths.add([...dirs, pick(FILE_NAMES)].join('/'));
    }
    writeFiles(root, Object.fromEntries([...paths].map(p => [p, `${p}\n`])));
    writeFiles(rules, { 'ignore.txt': some(IGNORE_POOL, 5).join('\n') });

    const config = createFilterConfig({
      rootPath: root,
      ignoreFile: join(rules, 'ignore.txt'),
      excludeFiles: some(EXCLUDE_FILE_POOL, 2),
      excludeDirs: some(EXCLUDE_DIR_POOL, 1),
      include: random() < 0.3 ? some(INCLUDE_POOL, 2) : [],
    });
    const matcher = PathMatcher.fromConfig(config);

    const expected = [...paths].filter(path => {
      const segments = path.split('/');
      for (let depth = 1; depth < segments.length; depth++) {
        if (matcher.decide(segments.slice(0, depth).join('/'), true) === 'exclude') return false;
      }
      return matcher.decide(path, false) === 'include';
    });

    const actual = collectFiles(buildTree(root, config).root).map(f => f.path);
    expect([...actual].sort()).toEqual(expected.sort());
  });
});
