/**
 * A commit from the recent history, newest first
 */
export interface CommitSummary {
    hash: string;
    author: string;
    date: string;
    message: string;
}

export interface Contributor {
    name: string;
    commits: number;
}

export type AnalysisStage = 'walk' | 'manifest' | 'license' | 'key_files' | 'history';

/**
 * A soft failure recorded while analyzing. The field it concerns keeps its default.
 *
 * Kinds in use:
 * - WALK_FAILED / WALK_DEADLINE_EXCEEDED
 * - MANIFEST_READ_FAILED / MANIFEST_PARSE_FAILED
 * - LICENSE_READ_FAILED
 * - KEY_FILE_READ_FAILED
 * - HISTORY_QUERY_FAILED
 * - STAGE_FAILED, when a component fails outright
 */
export interface AnalysisIssue {
    stage: AnalysisStage;
    kind: string;
    message: string;
    source?: string;
}

/**
 * Complete heuristic analysis of a repository. Frozen once returned.
 */
export interface RepoAnalysis {
    readonly path: string;
    readonly name: string;
    readonly description: string;

    // Structure
    readonly totalFiles: number;
    readonly totalDirs: number;
    readonly topDirs: Readonly<Record<string, number>>;
    readonly fileExtensions: Readonly<Record<string, number>>;

    // Languages & frameworks
    readonly languages: Readonly<Record<string, number>>;
    readonly frameworks: readonly string[];
    readonly packageManagers: readonly string[];
    readonly dependencies: Readonly<Record<string, readonly string[]>>;

    // Testing
    readonly hasTests: boolean;
    readonly testFramework: string;
    readonly testDirs: readonly string[];
    readonly testFileCount: number;

    // CI/CD
    readonly hasCi: boolean;
    readonly ciPlatform: string;
    readonly ciFiles: readonly string[];

    // Infrastructure
    readonly hasDocker: boolean;
    readonly dockerFiles: readonly string[];
    readonly hasK8s: boolean;

    // Documentation
    readonly hasReadme: boolean;
    readonly readmeExcerpt: string;
    readonly hasContributing: boolean;
    readonly hasChangelog: boolean;
    readonly hasLicense: boolean;
    readonly licenseType: string;

    // Git metadata
    readonly recentCommits: readonly Readonly<CommitSummary>[];
    readonly contributors: readonly Readonly<Contributor>[];
    readonly commitCount: number;
    readonly firstCommitDate: string;
    readonly lastCommitDate: string;

    // Code patterns
    readonly patterns: readonly string[];
    readonly entryPoints: readonly string[];
    readonly configFiles: readonly string[];

    readonly keyFileContents: Readonly<Record<string, string>>;

    readonly diagnostics: readonly Readonly<AnalysisIssue>[];
}

/**
 * Thrown before any analysis runs when the input is not an existing directory
 */
export class InvalidRepositoryPathError extends Error {
    readonly repoPath: string;

    constructor(repoPath: string) {
        super(`Not a directory: ${repoPath}`);
        this.name = 'InvalidRepositoryPathError';
        this.repoPath = repoPath;
    }
}
