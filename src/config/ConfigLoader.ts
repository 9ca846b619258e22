import fs from 'fs/promises';
import path from 'path';
import yaml from 'js-yaml';
import { AnalyzeOptions } from '../analyzer/RepoAnalyzer';
import { fileExists } from '../utils/fileUtils';
import logger from '../utils/logger';
import { AnalyzerConfig, DEFAULT_CONFIG } from './schema';

export const DEFAULT_CONFIG_FILE = '.repolens.yml';

export interface ConfigDiagnostics {
    configSource: string;
    overridesApplied: string[];
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Defaults for one section overlaid with whatever the file gives; `validate` checks the result
 */
function mergeSection<K extends keyof AnalyzerConfig>(raw: RawConfig, key: K): AnalyzerConfig[K] {
    const value = raw[key];
    return isRecord(value) ? { ...DEFAULT_CONFIG[key], ...value } : { ...DEFAULT_CONFIG[key] };
}

/**
 * Load and validate configuration
 */
export class ConfigLoader {
    private configSource: string = 'defaults';
    private overridesApplied: string[] = [];

    /**
     * Load configuration from file or use defaults
     */
    async load(configPath?: string): Promise<AnalyzerConfig> {
        let config: RawConfig = {};

        if (configPath) {
            config = await this.loadFromFile(configPath);
            this.configSource = configPath;
        } else {
            // Try to find .repolens.yml in current directory
            const defaultPath = path.join(process.cwd(), DEFAULT_CONFIG_FILE);
            if (await fileExists(defaultPath)) {
                config = await this.loadFromFile(defaultPath);
                this.configSource = defaultPath;
            }
        }

        const mergedConfig = this.mergeWithDefaults(config);
        this.applyEnvironmentOverrides(mergedConfig);
        this.validate(mergedConfig);

        logger.debug(`Configuration loaded from: ${this.configSource}`);
        return mergedConfig;
    }

    getDiagnostics(): ConfigDiagnostics {
        return {
            configSource: this.configSource,
            overridesApplied: [...this.overridesApplied],
        };
    }

    /**
     * Load config from file. An unreadable file falls back to defaults with a warning.
     */
    private async loadFromFile(filePath: string): Promise<RawConfig> {
        try {
            const content = await fs.readFile(filePath, 'utf-8');
            const loaded: unknown = yaml.load(content);
            if (loaded === undefined || loaded === null) return {};
            if (!isRecord(loaded)) {
                throw new Error('top level must be a mapping');
            }
            logger.info(`Loaded config from: ${filePath}`);
            return loaded;
        } catch (error) {
            logger.warn(`Failed to load config from ${filePath}: ${error}`);
            return {};
        }
    }

    /**
     * Merge with default configuration
     */
    private mergeWithDefaults(config: RawConfig): AnalyzerConfig {
        return {
            walk: mergeSection(config, 'walk'),
            manifests: mergeSection(config, 'manifests'),
            key_files: mergeSection(config, 'key_files'),
            history: mergeSection(config, 'history'),
            analysis: mergeSection(config, 'analysis'),
        };
    }

    /**
     * Apply environment variable overrides
     */
    private applyEnvironmentOverrides(config: AnalyzerConfig): void {
        if (process.env.REPOLENS_GIT_TIMEOUT_MS) {
            config.history.timeout_ms = parseInt(process.env.REPOLENS_GIT_TIMEOUT_MS, 10);
            this.overridesApplied.push('REPOLENS_GIT_TIMEOUT_MS');
        }
        if (process.env.REPOLENS_DEADLINE_MS) {
            config.analysis.deadline_ms = parseInt(process.env.REPOLENS_DEADLINE_MS, 10);
            this.overridesApplied.push('REPOLENS_DEADLINE_MS');
        }
        if (process.env.REPOLENS_MANIFEST_MAX_BYTES) {
            config.manifests.max_bytes = parseInt(process.env.REPOLENS_MANIFEST_MAX_BYTES, 10);
            this.overridesApplied.push('REPOLENS_MANIFEST_MAX_BYTES');
        }
        if (process.env.REPOLENS_SKIP_HISTORY === 'true') {
            config.history.enabled = false;
            this.overridesApplied.push('REPOLENS_SKIP_HISTORY');
        }
    }

    /**
     * Every limit must be a positive integer
     */
    private validate(config: AnalyzerConfig): void {
        const limits: Array<[string, number | undefined]> = [
            ['manifests.max_bytes', config.manifests.max_bytes],
            ['key_files.max_bytes', config.key_files.max_bytes],
            ['key_files.readme_excerpt_chars', config.key_files.readme_excerpt_chars],
            ['history.timeout_ms', config.history.timeout_ms],
            ['history.recent_commits', config.history.recent_commits],
            ['history.max_contributors', config.history.max_contributors],
            ['history.message_length', config.history.message_length],
            ['analysis.deadline_ms', config.analysis.deadline_ms],
        ];

        for (const [field, value] of limits) {
            if (field === 'analysis.deadline_ms' && value === undefined) continue;
            if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
                throw new Error(`Invalid configuration: ${field} must be a positive integer (got ${String(value)})`);
            }
        }

        if (typeof config.history.enabled !== 'boolean') {
            throw new Error('Invalid configuration: history.enabled must be true or false');
        }

        if (!Array.isArray(config.walk.extra_ignore_dirs)
            || !config.walk.extra_ignore_dirs.every(dir => typeof dir === 'string')) {
            throw new Error('Invalid configuration: walk.extra_ignore_dirs must be a list of directory names');
        }
    }
}

/**
 * Translate loaded configuration into analyzer options
 */
export function toAnalyzeOptions(config: AnalyzerConfig): AnalyzeOptions {
    return {
        extraIgnoreDirs: config.walk.extra_ignore_dirs,
        manifestMaxBytes: config.manifests.max_bytes,
        keyFiles: {
            maxBytes: config.key_files.max_bytes,
            readmeExcerptChars: config.key_files.readme_excerpt_chars,
        },
        history: config.history.enabled
            ? {
                timeoutMs: config.history.timeout_ms,
                recentCommits: config.history.recent_commits,
                maxContributors: config.history.max_contributors,
                messageLength: config.history.message_length,
            }
            : false,
        deadlineMs: config.analysis.deadline_ms,
    };
}
