/**
 * Syntax tag lookup for fenced blocks.
 */

import { basename, extname } from 'path';

export const DEFAULT_LANGUAGE = 'text';

/** Map file extension to markdown language hint */
const EXTENSION_LANGUAGES: Readonly<Record<string, string>> = {
  '.ts': 'typescript', '.tsx': 'typescript', '.mts': 'typescript', '.cts': 'typescript',
  '.js': 'javascript', '.jsx': 'javascript', '.mjs': 'javascript', '.cjs': 'javascript',
  '.py': 'python', '.pyi': 'python',
  '.rs': 'rust',
  '.go': 'go',
  '.java': 'java',
  '.kt': 'kotlin',
  '.rb': 'ruby',
  '.php': 'php',
  '.pl': 'perl',
  '.lua': 'lua',
  '.cs': 'csharp',
  '.cpp': 'cpp', '.cc': 'cpp', '.cxx': 'cpp', '.hpp': 'cpp', '.c': 'c', '.h': 'c',
  '.swift': 'swift',
  '.sh': 'bash', '.bash': 'bash', '.zsh': 'bash',
  '.sql': 'sql',
  '.html': 'html', '.htm': 'html',
  '.css': 'css', '.scss': 'scss', '.sass': 'sass', '.less': 'less',
  '.json': 'json',
  '.yaml': 'yaml', '.yml': 'yaml',
  '.toml': 'toml',
  '.xml': 'xml',
  '.md': 'markdown',
  '.graphql': 'graphql', '.gql': 'graphql',
  '.dockerfile': 'dockerfile',
  '.tf': 'hcl',
  '.proto': 'protobuf',
  '.vue': 'vue',
  '.svelte': 'svelte',
};

/** Extension-less files with a well-known syntax */
const FILENAME_LANGUAGES: ReadonlyMap<string, string> = new Map([
  ['Dockerfile', 'dockerfile'],
  ['Makefile', 'makefile'],
]);

/**
 * Syntax tag for a path. Extensions are matched case-insensitively;
 * unknown or missing extensions (including dotfiles such as `.bashrc`) give `text`.
 */
export function languageFor(path: string): string {
  const name = basename(path);
  const byName = FILENAME_LANGUAGES.get(name);
  if (byName) return byName;

  const ext = extname(name).toLowerCase();
  return Object.hasOwn(EXTENSION_LANGUAGES, ext) ? EXTENSION_LANGUAGES[ext] : DEFAULT_LANGUAGE;
}
