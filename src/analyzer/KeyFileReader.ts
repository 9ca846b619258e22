import path from 'path';
import { AnalysisIssue } from '../models/RepoAnalysis';
import { fileExists, findRootFile, readHead } from '../utils/fileUtils';
import logger from '../utils/logger';

const README = 'README.md';

export const KEY_FILES = [
    'README.md', 'CONTRIBUTING.md', 'ARCHITECTURE.md',
    'package.json', 'Cargo.toml', 'go.mod', 'pyproject.toml',
];

export interface KeyFileOptions {
    maxBytes: number;
    readmeExcerptChars: number;
}

export const DEFAULT_KEY_FILE_OPTIONS: KeyFileOptions = {
    maxBytes: 8000,
    readmeExcerptChars: 2000,
};

export interface KeyFileCapture {
    contents: Record<string, string>;
    readmeExcerpt: string;
    issues: AnalysisIssue[];
}

/**
 * Capture the head of a fixed set of files as context for downstream consumers.
 * The README is found in any letter case and keyed under its actual name.
 */
export async function readKeyFiles(
    root: string,
    options: KeyFileOptions = DEFAULT_KEY_FILE_OPTIONS
): Promise<KeyFileCapture> {
    const capture: KeyFileCapture = { contents: {}, readmeExcerpt: '', issues: [] };

    for (const keyFile of KEY_FILES) {
        let fileName = keyFile;
        try {
            if (keyFile === README) {
                const found = await findRootFile(root, README);
                if (!found) continue;
                fileName = found;
            }

            const filePath = path.join(root, fileName);
            if (!(await fileExists(filePath))) continue;

            const content = await readHead(filePath, options.maxBytes);
            capture.contents[fileName] = content;
            if (keyFile === README) {
                capture.readmeExcerpt = content.slice(0, options.readmeExcerptChars);
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`Failed to read key file ${fileName}: ${message}`);
            capture.issues.push({ stage: 'key_files', kind: 'KEY_FILE_READ_FAILED', message, source: fileName });
        }
    }

    return capture;
}
