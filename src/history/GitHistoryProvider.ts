import path from 'path';
import simpleGit from 'simple-git';
import { CommitSummary, Contributor } from '../models/RepoAnalysis';
import { dirExists, fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';
import { HistoryOptions, HistoryProvider, HistorySummary, emptyHistorySummary } from './HistoryProvider';

const SHORTLOG_LINE = /^\s*(\d+)\s+(.*)$/;

export function parseRecentLog(output: string, messageLength: number): CommitSummary[] {
    const commits: CommitSummary[] = [];
    for (const line of output.split('\n')) {
        if (!line.trim()) continue;

        const [hash, author, date, ...subject] = line.split('|');
        if (subject.length === 0) continue;

        commits.push({
            hash: hash.slice(0, 8),
            author,
            date,
            message: subject.join('|').slice(0, messageLength),
        });
    }
    return commits;
}

export function parseShortlog(output: string, maxContributors: number): Contributor[] {
    const contributors: Contributor[] = [];
    for (const line of output.split('\n')) {
        if (contributors.length >= maxContributors) break;
        const match = SHORTLOG_LINE.exec(line);
        if (!match) continue;

        contributors.push({ name: match[2].trim(), commits: parseInt(match[1], 10) });
    }
    return contributors;
}

/**
 * History through the git command line, via simple-git. Each query runs in its
 * own process under its own timeout.
 */
export class GitHistoryProvider implements HistoryProvider {
    async extract(root: string, options: HistoryOptions): Promise<HistorySummary> {
        const summary = emptyHistorySummary();

        const gitPath = path.join(root, '.git');
        if (!(await dirExists(gitPath)) && !(await fileExists(gitPath))) {
            logger.debug(`No git metadata in ${root}, skipping history`);
            return summary;
        }

        await Promise.all([
            this.attempt(summary, 'log', async () => {
                const output = await this.query(root, [
                    'log', '--no-decorate', `-${options.recentCommits}`, '--format=%H|%an|%ad|%s', '--date=short',
                ], options);
                summary.recentCommits = parseRecentLog(output, options.messageLength);
                summary.lastCommitDate = summary.recentCommits[0]?.date ?? '';
            }),
            this.attempt(summary, 'rev-list', async () => {
                const output = await this.query(root, ['rev-list', '--count', 'HEAD'], options);
                const count = parseInt(output.trim(), 10);
                if (Number.isNaN(count)) throw new Error(`Unexpected rev-list output: ${output.trim()}`);
                summary.commitCount = count;
            }),
            this.attempt(summary, 'first-commit', async () => {
                // Root commits only; a history may have several, the earliest wins
                const output = await this.query(root, [
                    'log', '--max-parents=0', '--format=%ad', '--date=short', 'HEAD',
                ], options);
                const dates = output.split('\n').map(line => line.trim()).filter(Boolean).sort();
                summary.firstCommitDate = dates[0] ?? '';
            }),
            this.attempt(summary, 'shortlog', async () => {
                const output = await this.query(root, ['shortlog', '-sn', '--no-merges', 'HEAD'], options);
                summary.contributors = parseShortlog(output, options.maxContributors);
            }),
        ]);

        logger.debug(`History of ${root}: ${summary.commitCount} commits, ${summary.contributors.length} contributors`);
        return summary;
    }

    private async attempt(summary: HistorySummary, name: string, run: () => Promise<void>): Promise<void> {
        try {
            await run();
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`git ${name} query failed: ${message}`);
            summary.issues.push({ stage: 'history', kind: 'HISTORY_QUERY_FAILED', message, source: name });
        }
    }

    private async query(root: string, args: string[], options: HistoryOptions): Promise<string> {
        const controller = new AbortController();
        const timer = setTimeout(() => controller.abort(), options.timeoutMs);
        const onDeadline = (): void => controller.abort();

        if (options.signal?.aborted) controller.abort();
        options.signal?.addEventListener('abort', onDeadline, { once: true });

        try {
            const git = simpleGit({
                baseDir: root,
                abort: controller.signal,
                timeout: { block: options.timeoutMs },
            });
            return await git.raw(args);
        } finally {
            clearTimeout(timer);
            options.signal?.removeEventListener('abort', onDeadline);
        }
    }
}
