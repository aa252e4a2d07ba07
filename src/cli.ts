#!/usr/bin/env node

/**
 * treescribe CLI
 *
 * Turn a directory (or a git repository URL) into one text document:
 * a tree of the project followed by the content of every selected file.
 */

import { Command } from 'commander';
import { writeFileSync, existsSync } from 'fs';
import { resolve } from 'path';
import { createRequire } from 'module';
import { loadConfig, CONFIG_TEMPLATE, type CliConfig } from './config.js';
import { cloneRepository, isGitUrl, type ClonedRepository } from './remote.js';
import {
    createFilterConfig,
    gatherContext,
    fileSink,
    clipboardSink,
    streamSink,
    multiSink,
    type OutputSink,
} from './context/index.js';

interface GenerateOptions {
    output?: string;
    clipboard?: boolean;
    stdout?: boolean;
    excludeFile: string[];
    excludeDir: string[];
    include: string[];
    ignore: string[];
    skipEmptyFiles?: boolean;
    ignoreFile?: string;
    globalIgnore?: string;
    gitignore: boolean;
    configPath?: string;
    verbose?: boolean;
}

const require = createRequire(import.meta.url);
const pkg = require('../package.json') as { version: string };

const program = new Command();

const collect = (value: string, previous: string[]) => previous.concat([value]);

/**
 * Apply config file values wherever the flag was not given on the command line.
 */
function applyConfig(options: GenerateOptions, config: CliConfig, command: Command): void {
    const src = (name: string) => command.getOptionValueSource(name);

    // Output
    if (config.output !== undefined && src('output') !== 'cli') options.output = config.output;
    if (config.clipboard !== undefined && src('clipboard') !== 'cli') options.clipboard = config.clipboard;
    if (config.stdout !== undefined && src('stdout') !== 'cli') options.stdout = config.stdout;

    // Filtering
    if (config.excludeFiles !== undefined && src('excludeFile') !== 'cli') options.excludeFile = config.excludeFiles;
    if (config.excludeDirs !== undefined && src('excludeDir') !== 'cli') options.excludeDir = config.excludeDirs;
    if (config.include !== undefined && src('include') !== 'cli') options.include = config.include;
    if (config.skipEmptyFiles !== undefined && src('skipEmptyFiles') !== 'cli') options.skipEmptyFiles = config.skipEmptyFiles;

    // Ignore files
    if (config.ignoreGitignore !== undefined && src('gitignore') !== 'cli') options.gitignore = !config.ignoreGitignore;
    if (config.ignoreFile !== undefined && src('ignoreFile') !== 'cli') options.ignoreFile = config.ignoreFile;
    if (config.globalIgnore !== undefined && src('globalIgnore') !== 'cli') options.globalIgnore = config.globalIgnore;
    if (config.ignore !== undefined && src('ignore') !== 'cli') options.ignore = config.ignore;

    // Misc
    if (config.verbose !== undefined && src('verbose') !== 'cli') options.verbose = config.verbose;
}

/**
 * Output goes to the clipboard unless a file or stdout was asked for;
 * --clipboard adds it back alongside either.
 */
function selectSink(options: GenerateOptions): OutputSink {
    const sinks: OutputSink[] = [];
    if (options.output) sinks.push(fileSink(options.output));
    if (options.stdout) sinks.push(streamSink());
    if (options.clipboard || sinks.length === 0) sinks.push(clipboardSink());
    return sinks.length === 1 ? sinks[0] : multiSink(sinks);
}

program
    .name('treescribe')
    .description('Convert a project directory into a single LLM-ready text document')
    .version(pkg.version);

/**
 * Generate command - the default
 */
program
    .command('generate', { isDefault: true })
    .description('Write the tree and file contents of a directory or git repository')
    .argument('<path>', 'Project directory or git repository URL')
    .option('-o, --output <file>', 'Output file path (default: clipboard)')
    .option('-c, --clipboard', 'Copy the output to the clipboard (default when no --output/--stdout)')
    .option('--stdout', 'Print the output to stdout')
    .option('-x, --exclude-file <glob>', 'Exclude files matching a glob (can be used multiple times)', collect, [] as string[])
    .option('-d, --exclude-dir <glob>', 'Exclude directories matching a glob (can be used multiple times)', collect, [] as string[])
    .option('-i, --include <glob>', 'Only include files matching a glob (can be used multiple times)', collect, [] as string[])
    .option('-s, --skip-empty-files', 'Skip files with zero size')
    .option('--ignore <pattern>', 'Extra gitignore-style pattern applied after the ignore files (can be used multiple times)', collect, [] as string[])
    .option('--ignore-file <path>', 'Ignore file to use instead of <path>/.gitignore')
    .option('--global-ignore <path>', 'Extra ignore file applied before the project one')
    .option('--no-gitignore', 'Do not apply any ignore file')
    .option('--config-path <path>', 'Path to config JSON file')
    .option('--verbose', 'Verbose output')
    .action(async (inputPath: string, options: GenerateOptions, command: Command) => {
        let clone: ClonedRepository | undefined;
        // Progress must not end up inside a document written to stdout
        const log = (message: string) => (options.stdout ? console.error : console.log)(message);

        try {
            if (options.configPath) {
                applyConfig(options, loadConfig(options.configPath), command);
                if (options.verbose) log(`Config loaded from: ${resolve(options.configPath)}`);
            }

            let rootPath = inputPath;
            if (isGitUrl(inputPath)) {
                if (options.verbose) log(`Cloning ${inputPath}...`);
                clone = cloneRepository(inputPath);
                rootPath = clone.path;
            }

            const config = createFilterConfig({
                rootPath,
                excludeFiles: options.excludeFile,
                excludeDirs: options.excludeDir,
                include: options.include,
                skipEmptyFiles: options.skipEmptyFiles ?? false,
                ignoreIgnoreFile: !options.gitignore,
                ignoreFile: options.ignoreFile,
                globalIgnore: options.globalIgnore,
                ignorePatterns: options.ignore,
            });

            const sink = selectSink(options);
            const result = await gatherContext(rootPath, config, { sink, verbose: options.verbose, log });

            if (result.fileCount === 0) {
                log('No files matched the specified criteria.');
            }
            log(`${result.fileCount} files written to ${sink.label} (${(result.totalSize / 1024).toFixed(1)}KB)`);
            if (options.verbose) {
                const t = result.timing;
                log(`  build: ${t.buildMs}ms, render: ${t.renderMs}ms, write: ${t.writeMs}ms`);
            }
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exitCode = 1;
        } finally {
            clone?.cleanup();
        }
    });

/**
 * Init command - create a starter config file
 */
program
    .command('init')
    .description('Create a starter config file')
    .argument('[path]', 'Output path for config file', 'treescribe.config.json')
    .action((outputPath: string) => {
        try {
            const absolutePath = resolve(outputPath);
            if (existsSync(absolutePath)) {
                console.error(`Error: File already exists: ${absolutePath}`);
                console.error('Delete it first or choose a different path.');
                process.exit(1);
            }
            const content = JSON.stringify(CONFIG_TEMPLATE, null, 2) + '\n';
            writeFileSync(absolutePath, content, 'utf-8');
            console.log(`Created config file: ${absolutePath}`);
            console.log(`Use it with: treescribe . --config-path ${outputPath}`);
        } catch (error) {
            console.error('Error:', error instanceof Error ? error.message : error);
            process.exit(1);
        }
    });

// Parse arguments and run
program.parseAsync().catch((error: unknown) => {
    console.error('Error:', error instanceof Error ? error.message : error);
    process.exitCode = 1;
});
