import path from 'path';
import { AnalysisIssue } from '../models/RepoAnalysis';
import { fileExists, readHead } from '../utils/fileUtils';
import logger from '../utils/logger';

export const LICENSE_FILES = ['LICENSE', 'LICENSE.md', 'LICENSE.txt'];
export const LICENSE_HEAD_BYTES = 500;

const LESSER = /\blesser\b|\blgpl\b/;

/**
 * Checked in order; the first family whose keyword appears wins
 */
const LICENSE_FAMILIES: ReadonlyArray<{ license: string; keyword: RegExp }> = [
    { license: 'MIT', keyword: /\bmit\b/ },
    { license: 'Apache-2.0', keyword: /\bapache\b/ },
    { license: 'GPL', keyword: /\bl?gpl\b|general public license/ },
    { license: 'BSD', keyword: /\bbsd\b/ },
    { license: 'MPL-2.0', keyword: /\bmpl\b|mozilla public license/ },
    { license: 'ISC', keyword: /\bisc\b/ },
];

export interface LicenseDetection {
    licenseType: string;
    issues: AnalysisIssue[];
}

/**
 * Name the license family from the opening text of a license file
 */
export function classifyLicenseText(text: string): string {
    const lower = text.toLowerCase();
    const family = LICENSE_FAMILIES.find(f => f.keyword.test(lower));
    if (!family) return '';
    if (family.license === 'GPL' && LESSER.test(lower)) return 'LGPL';
    return family.license;
}

/**
 * Reads only the head of the first license file present
 */
export class LicenseDetector {
    async detect(root: string): Promise<LicenseDetection> {
        for (const fileName of LICENSE_FILES) {
            const licensePath = path.join(root, fileName);
            if (!(await fileExists(licensePath))) continue;

            try {
                const head = await readHead(licensePath, LICENSE_HEAD_BYTES);
                return { licenseType: classifyLicenseText(head), issues: [] };
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                logger.warn(`Failed to read license file ${fileName}: ${message}`);
                return {
                    licenseType: '',
                    issues: [{ stage: 'license', kind: 'LICENSE_READ_FAILED', message, source: fileName }],
                };
            }
        }

        return { licenseType: '', issues: [] };
    }
}
