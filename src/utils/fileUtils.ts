import fs from 'fs/promises';
import path from 'path';
import * as fsWalk from '@nodelib/fs.walk';

/**
 * Read file content
 */
export async function readFile(filePath: string): Promise<string> {
    return await fs.readFile(filePath, 'utf-8');
}

/**
 * Read at most `maxBytes` from the start of a file, decoded as UTF-8.
 * A multi-byte sequence cut at the boundary decodes to U+FFFD.
 */
export async function readHead(filePath: string, maxBytes: number): Promise<string> {
    const handle = await fs.open(filePath, 'r');
    try {
        const buffer = Buffer.alloc(maxBytes);
        const { bytesRead } = await handle.read(buffer, 0, maxBytes, 0);
        return buffer.subarray(0, bytesRead).toString('utf-8');
    } finally {
        await handle.close();
    }
}

/**
 * Write content to file
 */
export async function writeFile(filePath: string, content: string): Promise<void> {
    const dir = path.dirname(filePath);
    await fs.mkdir(dir, { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
}

/**
 * Check if a regular file exists
 */
export async function fileExists(filePath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(filePath);
        return stat.isFile();
    } catch {
        return false;
    }
}

/**
 * Check if directory exists
 */
export async function dirExists(dirPath: string): Promise<boolean> {
    try {
        const stat = await fs.stat(dirPath);
        return stat.isDirectory();
    } catch {
        return false;
    }
}

/**
 * Stream every file and directory below `directory` as a POSIX relative path.
 * Directories carry a trailing slash. A directory whose name is in `ignoreDirs`
 * is neither reported nor read; files of the same name are reported.
 */
export async function* streamEntries(
    directory: string,
    ignoreDirs: Iterable<string>
): AsyncGenerator<string> {
    const ignored = new Set(ignoreDirs);
    const isPruned = (entry: fsWalk.Entry): boolean => entry.dirent.isDirectory() && ignored.has(entry.name);

    const entries: AsyncIterable<fsWalk.Entry> = fsWalk.walkStream(directory, {
        basePath: '',
        pathSegmentSeparator: '/',
        // Only directories are descended into, so a name check prunes exactly the ignored ones
        deepFilter: entry => !ignored.has(entry.name),
        entryFilter: entry => !isPruned(entry),
        // Unreadable subdirectories are skipped
        errorFilter: () => true,
    });

    for await (const entry of entries) {
        yield entry.dirent.isDirectory() ? `${entry.path}/` : entry.path;
    }
}

/**
 * Name of the regular file directly in `directory` that matches `fileName`
 * ignoring case. An exact match wins; otherwise the first in sorted order.
 */
export async function findRootFile(directory: string, fileName: string): Promise<string | undefined> {
    const lower = fileName.toLowerCase();
    const dirents = await fs.readdir(directory, { withFileTypes: true });
    const candidates = dirents
        .filter(dirent => dirent.isFile() && dirent.name.toLowerCase() === lower)
        .map(dirent => dirent.name)
        .sort();
    return candidates.find(name => name === fileName) ?? candidates[0];
}
