import { AnalysisIssue, CommitSummary, Contributor } from '../models/RepoAnalysis';

export interface HistoryOptions {
    /** Most recent commits to list */
    recentCommits: number;
    /** Contributors kept, by commit count */
    maxContributors: number;
    /** Commit subjects are cut to this many characters */
    messageLength: number;
    /** Per query */
    timeoutMs: number;
    /** Analysis-wide deadline */
    signal?: AbortSignal;
}

export const DEFAULT_HISTORY_OPTIONS: HistoryOptions = {
    recentCommits: 30,
    maxContributors: 10,
    messageLength: 120,
    timeoutMs: 10000,
};

export interface HistorySummary {
    recentCommits: CommitSummary[];
    contributors: Contributor[];
    commitCount: number;
    firstCommitDate: string;
    lastCommitDate: string;
    issues: AnalysisIssue[];
}

export function emptyHistorySummary(): HistorySummary {
    return {
        recentCommits: [],
        contributors: [],
        commitCount: 0,
        firstCommitDate: '',
        lastCommitDate: '',
        issues: [],
    };
}

/**
 * Read-only access to a repository's version-control history.
 * Implementations never throw; failed queries leave their fields empty and add an issue.
 */
export interface HistoryProvider {
    extract(root: string, options: HistoryOptions): Promise<HistorySummary>;
}
