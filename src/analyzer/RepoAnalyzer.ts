import path from 'path';
import { GitHistoryProvider } from '../history/GitHistoryProvider';
import {
    DEFAULT_HISTORY_OPTIONS,
    HistoryOptions,
    HistoryProvider,
    HistorySummary,
    emptyHistorySummary,
} from '../history/HistoryProvider';
import { LicenseDetection, LicenseDetector } from '../manifests/LicenseDetector';
import { DEFAULT_MANIFEST_MAX_BYTES, ManifestRegistry, ManifestScan } from '../manifests/ManifestRegistry';
import { AnalysisIssue, AnalysisStage, InvalidRepositoryPathError, RepoAnalysis } from '../models/RepoAnalysis';
import { mostCommon } from '../utils/counter';
import { dirExists } from '../utils/fileUtils';
import { deepFreeze } from '../utils/freeze';
import logger from '../utils/logger';
import { TreeWalker, emptyTreeSummary } from '../walker/TreeWalker';
import { mergeManifestResults } from './AnalysisMerger';
import { DEFAULT_KEY_FILE_OPTIONS, KeyFileCapture, KeyFileOptions, readKeyFiles } from './KeyFileReader';
import { classifyLanguages } from './LanguageClassifier';
import { detectPatterns } from './PatternDetector';

export const MAX_TOP_DIRS = 20;
export const MAX_EXTENSIONS = 20;

export interface AnalyzeOptions {
    /** `false` skips history extraction entirely */
    history?: Partial<Omit<HistoryOptions, 'signal'>> | false;
    historyProvider?: HistoryProvider;
    manifestRegistry?: ManifestRegistry;
    manifestMaxBytes?: number;
    keyFiles?: Partial<KeyFileOptions>;
    extraIgnoreDirs?: string[];
    /** Bounds the walk and every git query together */
    deadlineMs?: number;
}

/**
 * Orchestrates one analysis: walk, languages, manifests, patterns, key files, history.
 * After the path check nothing throws; failures end up in `diagnostics`.
 */
export class RepoAnalyzer {
    private readonly repoPath: string;

    constructor(repoPath: string, private readonly options: AnalyzeOptions = {}) {
        this.repoPath = path.resolve(repoPath);
    }

    async analyze(): Promise<RepoAnalysis> {
        if (!(await dirExists(this.repoPath))) {
            throw new InvalidRepositoryPathError(this.repoPath);
        }

        logger.info(`Analyzing ${this.repoPath}`);
        const startTime = Date.now();
        const signal = this.options.deadlineMs !== undefined ? AbortSignal.timeout(this.options.deadlineMs) : undefined;

        // Independent of each other; joined before anything that needs two of them
        const [tree, manifests, license, history] = await Promise.all([
            this.guard('walk', () => new TreeWalker({ extraIgnoreDirs: this.options.extraIgnoreDirs, signal }).walk(this.repoPath), emptyTreeSummary),
            this.guard('manifest', () => this.scanManifests(), (): ManifestScan => ({ manifests: [], issues: [] })),
            this.guard('license', () => new LicenseDetector().detect(this.repoPath), (): LicenseDetection => ({ licenseType: '', issues: [] })),
            this.guard('history', () => this.extractHistory(signal), emptyHistorySummary),
        ]);

        const languages = classifyLanguages(tree.extensionCounts);
        const merged = mergeManifestResults(manifests.manifests.map(m => m.result));

        const patterns = detectPatterns({
            topLevelDirs: new Set(tree.topLevelDirs),
            frameworks: merged.frameworks,
            extensions: new Set(tree.extensionCounts.keys()),
            description: merged.description,
            configFiles: tree.configFiles,
        });

        const keyFiles = await this.guard(
            'key_files',
            () => readKeyFiles(this.repoPath, { ...DEFAULT_KEY_FILE_OPTIONS, ...this.options.keyFiles }),
            (): KeyFileCapture => ({ contents: {}, readmeExcerpt: '', issues: [] })
        );

        const analysis: RepoAnalysis = {
            path: this.repoPath,
            name: path.basename(this.repoPath),
            description: merged.description,

            totalFiles: tree.totalFiles,
            totalDirs: tree.totalDirs,
            topDirs: Object.fromEntries(mostCommon(tree.topDirCounts, MAX_TOP_DIRS)),
            fileExtensions: Object.fromEntries(mostCommon(tree.extensionCounts, MAX_EXTENSIONS)),

            languages,
            frameworks: merged.frameworks,
            packageManagers: merged.packageManagers,
            dependencies: merged.dependencies,

            hasTests: tree.hasTests,
            testFramework: tree.testFramework,
            testDirs: tree.testDirs,
            testFileCount: tree.testFileCount,

            hasCi: tree.hasCi,
            ciPlatform: tree.ciPlatform,
            ciFiles: tree.ciFiles,

            hasDocker: tree.hasDocker,
            dockerFiles: tree.dockerFiles,
            hasK8s: tree.hasK8s,

            hasReadme: tree.hasReadme,
            readmeExcerpt: keyFiles.readmeExcerpt,
            hasContributing: tree.hasContributing,
            hasChangelog: tree.hasChangelog,
            hasLicense: tree.hasLicense,
            licenseType: license.licenseType,

            recentCommits: history.recentCommits,
            contributors: history.contributors,
            commitCount: history.commitCount,
            firstCommitDate: history.firstCommitDate,
            lastCommitDate: history.lastCommitDate,

            patterns,
            entryPoints: tree.entryPoints,
            configFiles: tree.configFiles,

            keyFileContents: keyFiles.contents,

            diagnostics: [
                ...tree.issues,
                ...manifests.issues,
                ...license.issues,
                ...keyFiles.issues,
                ...history.issues,
            ],
        };

        logger.info(
            `Analyzed ${analysis.name} in ${Date.now() - startTime}ms: ${analysis.totalFiles} files, `
            + `${analysis.frameworks.length} framework(s), ${analysis.diagnostics.length} diagnostic(s)`
        );
        return deepFreeze(analysis);
    }

    private scanManifests(): Promise<ManifestScan> {
        const registry = this.options.manifestRegistry
            ?? new ManifestRegistry(undefined, this.options.manifestMaxBytes ?? DEFAULT_MANIFEST_MAX_BYTES);
        return registry.scan(this.repoPath);
    }

    private async extractHistory(signal: AbortSignal | undefined): Promise<HistorySummary> {
        const history = this.options.history;
        if (history === false) {
            return emptyHistorySummary();
        }
        const provider = this.options.historyProvider ?? new GitHistoryProvider();
        return provider.extract(this.repoPath, { ...DEFAULT_HISTORY_OPTIONS, ...history, signal });
    }

    /**
     * Component boundary: an unexpected failure becomes the stage's default plus an issue
     */
    private async guard<T extends { issues: AnalysisIssue[] }>(
        stage: AnalysisStage,
        run: () => Promise<T>,
        fallback: () => T
    ): Promise<T> {
        try {
            return await run();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`Analysis stage ${stage} failed: ${message}`);
            const result = fallback();
            result.issues.push({ stage, kind: 'STAGE_FAILED', message });
            return result;
        }
    }
}

/**
 * Analyze a local directory. Throws only `InvalidRepositoryPathError`.
 */
export async function analyzeRepository(repoPath: string, options: AnalyzeOptions = {}): Promise<RepoAnalysis> {
    return new RepoAnalyzer(repoPath, options).analyze();
}
