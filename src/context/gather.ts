/**
 * Context Gatherer - full pipeline:
 *
 * 1. Validate the root (fatal if missing or not a directory)
 * 2. Build the filtered tree, collecting read warnings
 * 3. Render the document (tree diagram + fenced file blocks)
 * 4. Hand the text to the sink, if one was given
 *
 * Configuration errors propagate untouched; nothing reaches the sink then.
 */

import type { FilterConfig } from './config.js';
import { renderDocument, renderTree } from './render.js';
import type { OutputSink } from './sink.js';
import { buildTree, collectFiles, type DirectoryNode, type ReadWarning } from './tree.js';

export interface GatherOptions {
  /** Where the finished document goes; omitted means "just return it" */
  sink?: OutputSink;
  /** Verbose logging */
  verbose?: boolean;
  /** Progress output; defaults to console.log */
  log?: (message: string) => void;
}

export interface GeneratedContext {
  /** The full document */
  text: string;
  /** The tree diagram on its own */
  tree: string;
  root: DirectoryNode;
  /** Number of file blocks in the document */
  fileCount: number;
  /** Total bytes of file content included */
  contentSize: number;
  warnings: ReadWarning[];
}

export interface GatherResult extends GeneratedContext {
  /** Document size in bytes */
  totalSize: number;
  timing: {
    buildMs: number;
    renderMs: number;
    writeMs: number;
    totalMs: number;
  };
}

/**
 * Build and render without writing anywhere.
 */
export function generateContext(rootPath: string, config: FilterConfig): GeneratedContext {
  const { root, warnings } = buildTree(rootPath, config);
  const files = collectFiles(root);
  const tree = renderTree(root);

  return {
    text: renderDocument(tree, files),
    tree,
    root,
    fileCount: files.length,
    contentSize: files.reduce((sum, f) => sum + f.size, 0),
    warnings,
  };
}

export async function gatherContext(
  rootPath: string,
  config: FilterConfig,
  options: GatherOptions = {}
): Promise<GatherResult> {
  const totalStart = Date.now();
  const { verbose = false, log = console.log } = options;

  // ── Step 1+2: Walk and filter ───────────────────────────────────────────
  const buildStart = Date.now();
  const { root, warnings } = buildTree(rootPath, config);
  const buildMs = Date.now() - buildStart;
  const files = collectFiles(root);

  if (verbose) {
    log(`  Tree built in ${buildMs}ms (${files.length} files)`);
    if (config.includeRules.length > 0) {
      log(`  Include-only: ${config.includeRules.map(r => r.pattern).join(', ')}`);
    }
  }

  for (const warning of warnings) {
    console.warn(`Warning: ${warning.message}`);
  }

  // ── Step 3: Render ──────────────────────────────────────────────────────
  const renderStart = Date.now();
  const tree = renderTree(root);
  const text = renderDocument(tree, files);
  const renderMs = Date.now() - renderStart;

  // ── Step 4: Write ───────────────────────────────────────────────────────
  let writeMs = 0;
  if (options.sink) {
    const writeStart = Date.now();
    await options.sink.write(text);
    writeMs = Date.now() - writeStart;

    if (verbose) {
      log(`  Wrote ${(Buffer.byteLength(text, 'utf-8') / 1024).toFixed(1)}KB to ${options.sink.label} in ${writeMs}ms`);
    }
  }

  if (warnings.length > 0) {
    console.warn(`Skipped ${warnings.length} unreadable path(s)`);
  }

  return {
    text,
    tree,
    root,
    fileCount: files.length,
    contentSize: files.reduce((sum, f) => sum + f.size, 0),
    totalSize: Buffer.byteLength(text, 'utf-8'),
    warnings,
    timing: { buildMs, renderMs, writeMs, totalMs: Date.now() - totalStart },
  };
}
