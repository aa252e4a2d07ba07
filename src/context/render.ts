/**
 * Content Serializer - turns a node tree into the output document:
 * the ASCII tree diagram, a blank line, then one fenced block per file.
 */

import { collectFiles, type DirectoryNode, type FileNode } from './tree.js';

const MIN_FENCE_LENGTH = 3;

/**
 * Tree diagram. First line is the root name, directories end in `/`.
 * No trailing newline.
 */
export function renderTree(root: DirectoryNode): string {
  const lines: string[] = [`${root.name}/`];

  // Explicit stack of iterators keeps depth-first order without recursion
  const walk: { children: DirectoryNode['children']; index: number; prefix: string }[] = [
    { children: root.children, index: 0, prefix: '' },
  ];

  while (walk.length > 0) {
    const level = walk[walk.length - 1];
    if (level.index >= level.children.length) {
      walk.pop();
      continue;
    }

    const entry = level.children[level.index++];
    const isLast = level.index === level.children.length;
    const connector = isLast ? '└── ' : '├── ';

    if (entry.kind === 'directory') {
      lines.push(`${level.prefix}${connector}${entry.name}/`);
      walk.push({
        children: entry.children,
        index: 0,
        prefix: `${level.prefix}${isLast ? '    ' : '│   '}`,
      });
    } else {
      lines.push(`${level.prefix}${connector}${entry.name}`);
    }
  }

  return lines.join('\n');
}

/** Longest run of consecutive backticks anywhere in the text. */
function longestBacktickRun(text: string): number {
  let longest = 0;
  for (const match of text.matchAll(/`+/g)) {
    longest = Math.max(longest, match[0].length);
  }
  return longest;
}

/**
 * Fence that cannot be closed by anything inside `content`.
 */
export function fenceFor(content: string): string {
  return '`'.repeat(Math.max(MIN_FENCE_LENGTH, longestBacktickRun(content) + 1));
}

/**
 * One file block, ending in a newline:
 *
 *     # File: src/app.ts
 *     ```typescript
 *     ...content...
 *     ```
 *     # End of file: src/app.ts
 */
export function renderFileBlock(file: FileNode): string {
  const fence = fenceFor(file.content);
  const body = file.content === '' || file.content.endsWith('\n')
    ? file.content
    : `${file.content}\n`;

  return (
    `# File: ${file.path}\n` +
    `${fence}${file.language}\n` +
    body +
    `${fence}\n` +
    `# End of file: ${file.path}\n`
  );
}

/**
 * Assemble a document from a rendered tree and its files.
 * With no files the document is the tree and a newline.
 */
export function renderDocument(tree: string, files: readonly FileNode[]): string {
  if (files.length === 0) return `${tree}\n`;
  return `${tree}\n\n${files.map(renderFileBlock).join('\n')}`;
}

/**
 * The whole document. Files appear in the same depth-first order as the tree.
 */
export function render(root: DirectoryNode): string {
  return renderDocument(renderTree(root), collectFiles(root));
}
