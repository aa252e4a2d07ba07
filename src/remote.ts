/**
 * Remote repositories: a git URL given instead of a directory is
 * shallow-cloned into a temp directory for the duration of the run.
 */

import { execFileSync } from 'child_process';
import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ConfigurationError, errorCode } from './context/errors.js';

const GIT_URL_PREFIXES = ['http://', 'https://', 'git@', 'ssh://', 'git://', 'file://'];

export function isGitUrl(path: string): boolean {
    return GIT_URL_PREFIXES.some(prefix => path.startsWith(prefix)) || path.endsWith('.git');
}

export interface ClonedRepository {
    /** Checkout directory */
    path: string;
    /** Remove the checkout; safe to call more than once */
    cleanup(): void;
}

/**
 * `git clone --depth 1` into a fresh temp directory.
 * Throws ConfigurationError if git is missing or the clone fails.
 */
export function cloneRepository(url: string): ClonedRepository {
    const path = mkdtempSync(join(tmpdir(), 'treescribe-'));
    const cleanup = () => rmSync(path, { recursive: true, force: true });

    try {
        execFileSync('git', ['clone', '--depth', '1', '--quiet', url, path], { stdio: 'ignore' });
    } catch (error) {
        cleanup();
        if (errorCode(error) === 'ENOENT') {
            throw new ConfigurationError("'git' command not found. Please ensure Git is installed and in your PATH.", { cause: error });
        }
        throw new ConfigurationError(`Error cloning repository (check the URL and your access): ${url}`, { cause: error });
    }

    return { path, cleanup };
}
