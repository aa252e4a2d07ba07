export { generateContext, gatherContext } from './gather.js';
export type { GatherOptions, GatherResult, GeneratedContext } from './gather.js';

// Filtering
export { createFilterConfig, DEFAULT_IGNORE_FILE_NAME } from './config.js';
export type { FilterConfig, FilterInput } from './config.js';
export { PathMatcher } from './filter.js';
export type { Decision } from './filter.js';
export { findPatternProblem, assertValidPattern, parseIgnoreFile, cliRules, ignorePatternRules } from './patterns.js';
export type { Rule, RuleSource } from './patterns.js';

// Tree building
export { buildTree, validateRoot, collectFiles } from './tree.js';
export type { TreeNode, FileNode, DirectoryNode, ReadWarning, BuildResult } from './tree.js';
export { readTextFile } from './reader.js';
export { languageFor, DEFAULT_LANGUAGE } from './language.js';

// Rendering
export { render, renderDocument, renderTree, renderFileBlock, fenceFor } from './render.js';

// Output
export { fileSink, clipboardSink, streamSink, multiSink } from './sink.js';
export type { OutputSink } from './sink.js';

// Errors
export { ConfigurationError, ReadError } from './errors.js';
export type { ReadFailure } from './errors.js';
