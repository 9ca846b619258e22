import { ConfigDiagnostics } from '../config/ConfigLoader';
import { AnalyzerConfig } from '../config/schema';
import { EnvLoadResult } from '../utils/EnvLoader';

/**
 * Print the resolved settings for a verbose run. Goes to stderr so stdout stays pipeable.
 */
export function printStartupDiagnostics(
    config: AnalyzerConfig,
    configDiagnostics: ConfigDiagnostics,
    env: EnvLoadResult
): void {
    const lines = [
        'Config source: ' + configDiagnostics.configSource,
        'Env overrides: ' + (configDiagnostics.overridesApplied.join(', ') || 'none'),
        'Env files: ' + (env.loadedFrom.join(', ') || 'none'),
        'Extra ignored dirs: ' + (config.walk.extra_ignore_dirs.join(', ') || 'none'),
        `Manifest read limit: ${config.manifests.max_bytes} bytes`,
        `Key file read limit: ${config.key_files.max_bytes} bytes`,
        config.history.enabled
            ? `History: ${config.history.recent_commits} commits, ${config.history.max_contributors} contributors, ${config.history.timeout_ms}ms per query`
            : 'History: disabled',
        `Deadline: ${config.analysis.deadline_ms !== undefined ? `${config.analysis.deadline_ms}ms` : 'none'}`,
    ];
    console.error(lines.join('\n'));
}
