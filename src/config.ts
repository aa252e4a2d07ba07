/**
 * Project config file (treescribe.config.json)
 *
 * Holds the options of a recurring run:
 * - Output (output, clipboard, stdout)
 * - Filtering (excludeFiles, excludeDirs, include, skipEmptyFiles)
 * - Ignore files (ignoreGitignore, ignoreFile, globalIgnore, ignore)
 * - Misc (verbose)
 *
 * All fields optional. Priority: CLI flags > config file > hardcoded defaults.
 */

import { readFileSync, existsSync } from 'fs';
import { resolve, dirname, isAbsolute } from 'path';
import { ConfigurationError } from './context/errors.js';

export interface CliConfig {
    // Output
    output?: string;
    clipboard?: boolean;
    stdout?: boolean;

    // Filtering
    excludeFiles?: string[];
    excludeDirs?: string[];
    include?: string[];
    skipEmptyFiles?: boolean;

    // Ignore files
    ignoreGitignore?: boolean;
    ignoreFile?: string;
    globalIgnore?: string;
    /** Extra gitignore-style patterns */
    ignore?: string[];

    // Misc
    verbose?: boolean;
}

// ── Validation helpers ──────────────────────────────────────────────────────

const KNOWN_KEYS = new Set<string>([
    'output', 'clipboard', 'stdout',
    'excludeFiles', 'excludeDirs', 'include', 'skipEmptyFiles',
    'ignoreGitignore', 'ignoreFile', 'globalIgnore', 'ignore',
    'verbose',
]);

function assertString(obj: Record<string, unknown>, key: string): string {
    const val = obj[key];
    if (typeof val !== 'string') throw new ConfigurationError(`Config "${key}" must be a string`);
    return val;
}

function assertBoolean(obj: Record<string, unknown>, key: string): boolean {
    const val = obj[key];
    if (typeof val !== 'boolean') throw new ConfigurationError(`Config "${key}" must be a boolean`);
    return val;
}

function assertStringArray(obj: Record<string, unknown>, key: string): string[] {
    const val = obj[key];
    if (!Array.isArray(val)) {
        throw new ConfigurationError(`Config "${key}" must be an array of strings`);
    }
    const strings: string[] = [];
    for (const item of val) {
        if (typeof item !== 'string') throw new ConfigurationError(`Config "${key}" must be an array of strings`);
        strings.push(item);
    }
    return strings;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// ── Main loader ─────────────────────────────────────────────────────────────

/**
 * Read `configPath` (relative to the working directory) into a CliConfig.
 * Relative paths inside the file resolve from the file's own directory.
 * Throws ConfigurationError on a missing file, bad JSON or a wrongly typed key.
 */
export function loadConfig(configPath: string): CliConfig {
    const absolutePath = resolve(configPath);

    if (!existsSync(absolutePath)) {
        throw new ConfigurationError(`Config file not found: ${absolutePath}`);
    }

    let raw: string;
    try {
        raw = readFileSync(absolutePath, 'utf-8');
    } catch (error) {
        throw new ConfigurationError(`Failed to read config file: ${absolutePath}`, { cause: error });
    }

    let parsed: unknown;
    try {
        parsed = JSON.parse(raw);
    } catch (error) {
        throw new ConfigurationError(`Invalid JSON in config file: ${absolutePath}`, { cause: error });
    }

    if (!isRecord(parsed)) {
        throw new ConfigurationError(`Config file must contain a JSON object: ${absolutePath}`);
    }

    const obj = parsed;

    // Warn about unknown keys
    const unknownKeys = Object.keys(obj).filter(k => !KNOWN_KEYS.has(k));
    if (unknownKeys.length > 0) {
        console.warn(`Warning: Unknown config keys ignored: ${unknownKeys.join(', ')}`);
    }

    const config: CliConfig = {};
    const configDir = dirname(absolutePath);
    const fromConfigDir = (p: string) => isAbsolute(p) ? p : resolve(configDir, p);

    // Output
    if (obj.output !== undefined) config.output = fromConfigDir(assertString(obj, 'output'));
    if (obj.clipboard !== undefined) config.clipboard = assertBoolean(obj, 'clipboard');
    if (obj.stdout !== undefined) config.stdout = assertBoolean(obj, 'stdout');

    // Filtering
    if (obj.excludeFiles !== undefined) config.excludeFiles = assertStringArray(obj, 'excludeFiles');
    if (obj.excludeDirs !== undefined) config.excludeDirs = assertStringArray(obj, 'excludeDirs');
    if (obj.include !== undefined) config.include = assertStringArray(obj, 'include');
    if (obj.skipEmptyFiles !== undefined) config.skipEmptyFiles = assertBoolean(obj, 'skipEmptyFiles');

    // Ignore files
    if (obj.ignoreGitignore !== undefined) config.ignoreGitignore = assertBoolean(obj, 'ignoreGitignore');
    if (obj.ignoreFile !== undefined) config.ignoreFile = fromConfigDir(assertString(obj, 'ignoreFile'));
    if (obj.globalIgnore !== undefined) config.globalIgnore = fromConfigDir(assertString(obj, 'globalIgnore'));
    if (obj.ignore !== undefined) config.ignore = assertStringArray(obj, 'ignore');

    // Misc
    if (obj.verbose !== undefined) config.verbose = assertBoolean(obj, 'verbose');

    return config;
}

// ── Default template ────────────────────────────────────────────────────────

/** Written by `treescribe init` */
export const CONFIG_TEMPLATE: CliConfig = {
    // Output
    output: 'context.md',
    clipboard: false,
    stdout: false,

    // Filtering
    excludeFiles: ['*.lock', 'package-lock.json'],
    excludeDirs: ['node_modules', 'dist', 'coverage'],
    include: [],
    skipEmptyFiles: true,

    // Ignore files
    ignoreGitignore: false,
    ignore: [],

    // Misc
    verbose: false,
};
