/**
 * File Reader - loads one file as text, or explains why it cannot.
 */

import { readFileSync } from 'fs';
import { ReadError, errorCode, readFailureFromCode } from './errors.js';

export interface FileContent {
    content: string;
    /** Size in bytes as read from disk */
    size: number;
}

/**
 * Read a file fully as UTF-8 text.
 * Content with a NUL byte or an invalid UTF-8 sequence counts as binary.
 *
 * @throws ReadError on any failure; never anything else for an fs problem
 */
export function readTextFile(absolutePath: string, relativePath: string): FileContent {
    let bytes: Buffer;
    try {
        bytes = readFileSync(absolutePath);
    } catch (error) {
        const reason = readFailureFromCode(errorCode(error));
        const detail = error instanceof Error ? error.message : String(error);
        throw new ReadError(relativePath, reason, `Cannot read ${relativePath}: ${detail}`, { cause: error });
    }

    if (bytes.includes(0)) {
        throw new ReadError(relativePath, 'binary', `Skipping binary file ${relativePath}`);
    }

    let content: string;
    try {
        content = new TextDecoder('utf-8', { fatal: true, ignoreBOM: true }).decode(bytes);
    } catch (error) {
        throw new ReadError(relativePath, 'binary', `Skipping non-UTF-8 file ${relativePath}`, { cause: error });
    }

    return { content, size: bytes.length };
}
