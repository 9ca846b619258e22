import { AnalysisIssue } from '../models/RepoAnalysis';
import { increment } from '../utils/counter';
import { streamEntries } from '../utils/fileUtils';
import logger from '../utils/logger';
import { classifyFile, FileClassification, IGNORE_DIRS } from './TreeRules';

export interface WalkOptions {
    /** Directory names pruned in addition to the built-in set */
    extraIgnoreDirs?: string[];
    signal?: AbortSignal;
}

/**
 * What one traversal of the tree found. Counters are complete; callers truncate.
 */
export interface TreeSummary {
    totalFiles: number;
    totalDirs: number;
    /** Names of the root's directories, sorted, including ones with no counted files */
    topLevelDirs: string[];
    topDirCounts: Map<string, number>;
    extensionCounts: Map<string, number>;

    hasTests: boolean;
    testFramework: string;
    testDirs: string[];
    testFileCount: number;

    hasCi: boolean;
    ciPlatform: string;
    ciFiles: string[];

    hasDocker: boolean;
    dockerFiles: string[];
    hasK8s: boolean;

    hasReadme: boolean;
    hasContributing: boolean;
    hasChangelog: boolean;
    hasLicense: boolean;

    configFiles: string[];
    entryPoints: string[];

    issues: AnalysisIssue[];
}

export function emptyTreeSummary(): TreeSummary {
    return {
        totalFiles: 0,
        totalDirs: 0,
        topLevelDirs: [],
        topDirCounts: new Map(),
        extensionCounts: new Map(),
        hasTests: false,
        testFramework: '',
        testDirs: [],
        testFileCount: 0,
        hasCi: false,
        ciPlatform: '',
        ciFiles: [],
        hasDocker: false,
        dockerFiles: [],
        hasK8s: false,
        hasReadme: false,
        hasContributing: false,
        hasChangelog: false,
        hasLicense: false,
        configFiles: [],
        entryPoints: [],
        issues: [],
    };
}

/**
 * Walks a repository once, pruning ignored directories before they are read,
 * and folds every file through the classification rules
 */
export class TreeWalker {
    private readonly ignoreDirs: ReadonlySet<string>;

    constructor(private readonly options: WalkOptions = {}) {
        this.ignoreDirs = new Set([...IGNORE_DIRS, ...(options.extraIgnoreDirs ?? [])]);
    }

    async walk(root: string): Promise<TreeSummary> {
        const summary = emptyTreeSummary();
        const files: string[] = [];
        const topLevelDirs: string[] = [];

        try {
            for await (const entry of streamEntries(root, this.ignoreDirs)) {
                if (this.options.signal?.aborted) {
                    logger.warn(`Tree walk of ${root} stopped at the analysis deadline`);
                    summary.issues.push({
                        stage: 'walk',
                        kind: 'WALK_DEADLINE_EXCEEDED',
                        message: 'Tree walk stopped at the analysis deadline; counts are partial',
                    });
                    break;
                }
                if (entry.endsWith('/')) {
                    summary.totalDirs++;
                    const dir = entry.slice(0, -1);
                    if (!dir.includes('/')) topLevelDirs.push(dir);
                } else {
                    files.push(entry);
                }
            }
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`Tree walk of ${root} failed: ${message}`);
            summary.issues.push({ stage: 'walk', kind: 'WALK_FAILED', message, source: root });
        }

        // Sorted so list outputs do not depend on directory read order
        const byCodePoint = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);
        files.sort(byCodePoint);
        summary.topLevelDirs = topLevelDirs.sort(byCodePoint);

        const testDirs = new Set<string>();
        let explicitFramework = false;

        for (const relPath of files) {
            const file = classifyFile(relPath);
            if (file.ignored) continue;

            summary.totalFiles++;
            if (file.extension) increment(summary.extensionCounts, file.extension);
            if (file.topDir) increment(summary.topDirCounts, file.topDir);

            if (file.isTest) {
                summary.hasTests = true;
                summary.testFileCount++;
                if (file.topDir && file.topDir !== 'src') testDirs.add(file.topDir);
            }

            if (file.testFramework) {
                if (file.testFramework.explicit) {
                    if (!explicitFramework) {
                        summary.testFramework = file.testFramework.label;
                        explicitFramework = true;
                    }
                } else if (!summary.testFramework) {
                    summary.testFramework = file.testFramework.label;
                }
            }

            this.applyInfrastructure(summary, file);
        }

        summary.testDirs = Array.from(testDirs).sort();

        logger.debug(`Walked ${root}: ${summary.totalFiles} files, ${summary.totalDirs} directories`);
        return summary;
    }

    private applyInfrastructure(summary: TreeSummary, file: FileClassification): void {
        if (file.ciProvider) {
            summary.hasCi = true;
            summary.ciPlatform = summary.ciPlatform || file.ciProvider;
            summary.ciFiles.push(file.relPath);
        }

        if (file.isDocker) {
            summary.hasDocker = true;
            summary.dockerFiles.push(file.relPath);
        }
        if (file.isK8s) summary.hasK8s = true;

        if (file.isRootReadme) summary.hasReadme = true;
        if (file.isContributing) summary.hasContributing = true;
        if (file.isChangelog) summary.hasChangelog = true;
        if (file.isLicense) summary.hasLicense = true;

        if (file.isConfig) summary.configFiles.push(file.relPath);
        if (file.isEntryPoint) summary.entryPoints.push(file.relPath);
    }
}
