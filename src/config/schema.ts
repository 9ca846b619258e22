/**
 * Configuration schema for repolens
 */
export interface AnalyzerConfig {
    walk: {
        /** Directory names pruned in addition to the built-in set */
        extra_ignore_dirs: string[];
    };
    manifests: {
        max_bytes: number;
    };
    key_files: {
        max_bytes: number;
        readme_excerpt_chars: number;
    };
    history: {
        enabled: boolean;
        timeout_ms: number;
        recent_commits: number;
        max_contributors: number;
        message_length: number;
    };
    analysis: {
        /** Bounds the whole analysis; unset means no deadline */
        deadline_ms?: number;
    };
}

/**
 * Default configuration
 */
export const DEFAULT_CONFIG: AnalyzerConfig = {
    walk: {
        extra_ignore_dirs: [],
    },
    manifests: {
        max_bytes: 50000,
    },
    key_files: {
        max_bytes: 8000,
        readme_excerpt_chars: 2000,
    },
    history: {
        enabled: true,
        timeout_ms: 10000,
        recent_commits: 30,
        max_contributors: 10,
        message_length: 120,
    },
    analysis: {},
};
