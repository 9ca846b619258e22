import { RepoAnalysis } from '../models/RepoAnalysis';
import { writeFile } from '../utils/fileUtils';
import logger from '../utils/logger';

export const SUMMARY_LIMITS = {
    languages: 8,
    topDirs: 12,
    dependenciesPerCategory: 15,
    contributors: 8,
};

/** Field name -> value, for the fields that carry something */
export type SerializableAnalysis = Partial<Record<keyof RepoAnalysis, unknown>>;

function isEmpty(value: unknown): boolean {
    if (value === undefined || value === null || value === false || value === 0 || value === '') return true;
    if (Array.isArray(value)) return value.length === 0;
    if (typeof value === 'object') return Object.keys(value).length === 0;
    return false;
}

function byValueDescending(values: Readonly<Record<string, number>>): [string, number][] {
    return Object.entries(values).sort(([, a], [, b]) => b - a);
}

/**
 * Renders an analysis for storage, piping and prompt context
 */
export class ReportGenerator {
    /**
     * The record with empty, zero and false fields dropped
     */
    toSerializable(analysis: RepoAnalysis): SerializableAnalysis {
        const serializable: Record<string, unknown> = {};
        for (const [key, value] of Object.entries(analysis)) {
            if (!isEmpty(value)) serializable[key] = value;
        }
        return serializable;
    }

    toJSON(analysis: RepoAnalysis): string {
        return JSON.stringify(this.toSerializable(analysis), null, 2);
    }

    /**
     * Write the serializable record to a file
     */
    async writeJSON(analysis: RepoAnalysis, jsonPath: string): Promise<string> {
        await writeFile(jsonPath, `${this.toJSON(analysis)}\n`);
        logger.info(`JSON analysis written: ${jsonPath}`);
        return jsonPath;
    }

    /**
     * Flattened text summary in a fixed field order
     */
    summarizeForPrompt(analysis: RepoAnalysis): string {
        const lines: string[] = [];
        lines.push(`Repository: ${analysis.name}`);
        if (analysis.description) {
            lines.push(`Description: ${analysis.description}`);
        }
        lines.push(`Files: ${analysis.totalFiles}, Directories: ${analysis.totalDirs}`);

        const languages = byValueDescending(analysis.languages).slice(0, SUMMARY_LIMITS.languages);
        if (languages.length > 0) {
            lines.push(`Languages: ${languages.map(([language, pct]) => `${language} (${pct.toFixed(0)}%)`).join(', ')}`);
        }

        if (analysis.frameworks.length > 0) {
            lines.push(`Frameworks: ${analysis.frameworks.join(', ')}`);
        }

        const dirs = byValueDescending(analysis.topDirs).slice(0, SUMMARY_LIMITS.topDirs);
        if (dirs.length > 0) {
            lines.push(`Top directories: ${dirs.map(([dir, count]) => `${dir}/ (${count} files)`).join(', ')}`);
        }

        for (const [category, deps] of Object.entries(analysis.dependencies)) {
            if (deps.length > 0) {
                lines.push(`${category} deps: ${deps.slice(0, SUMMARY_LIMITS.dependenciesPerCategory).join(', ')}`);
            }
        }

        if (analysis.hasTests) {
            const framework = analysis.testFramework || 'detected';
            const dirsText = analysis.testDirs.join(', ') || 'various dirs';
            lines.push(`Testing: ${framework}, ${analysis.testFileCount} test files in ${dirsText}`);
        }

        if (analysis.hasCi) {
            lines.push(`CI/CD: ${analysis.ciPlatform}, files: ${analysis.ciFiles.join(', ')}`);
        }

        if (analysis.hasDocker) {
            lines.push(`Docker: ${analysis.dockerFiles.join(', ')}`);
        }
        if (analysis.hasK8s) {
            lines.push('Kubernetes: manifests detected');
        }

        if (analysis.licenseType) {
            lines.push(`License: ${analysis.licenseType}`);
        }

        if (analysis.patterns.length > 0) {
            lines.push(`Patterns: ${analysis.patterns.join(', ')}`);
        }

        if (analysis.entryPoints.length > 0) {
            lines.push(`Entry points: ${analysis.entryPoints.join(', ')}`);
        }

        if (analysis.configFiles.length > 0) {
            lines.push(`Config files: ${analysis.configFiles.join(', ')}`);
        }

        if (analysis.commitCount) {
            lines.push(`Commits: ${analysis.commitCount}, active ${analysis.firstCommitDate} to ${analysis.lastCommitDate}`);
        }

        if (analysis.contributors.length > 0) {
            const contributors = analysis.contributors
                .slice(0, SUMMARY_LIMITS.contributors)
                .map(c => `${c.name} (${c.commits})`)
                .join(', ');
            lines.push(`Contributors: ${contributors}`);
        }

        return lines.join('\n');
    }
}
