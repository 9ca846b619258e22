import { PartialManifestResult } from '../manifests/ManifestInterpreter';

export interface MergedManifests {
    description: string;
    frameworks: string[];
    packageManagers: string[];
    dependencies: Record<string, string[]>;
}

function union(target: string[], values: readonly string[]): void {
    for (const value of values) {
        if (!target.includes(value)) target.push(value);
    }
}

/**
 * Merge partial manifest results in the order given.
 * The description is first-writer-wins; labeled sets are unioned without duplicates.
 * A dependency category is cut to the smallest limit any contributing interpreter applied.
 */
export function mergeManifestResults(results: readonly PartialManifestResult[]): MergedManifests {
    const merged: MergedManifests = { description: '', frameworks: [], packageManagers: [], dependencies: {} };
    const limits = new Map<string, number>();

    for (const result of results) {
        if (!merged.description && result.description) {
            merged.description = result.description;
        }
        if (result.packageManager) {
            union(merged.packageManagers, [result.packageManager]);
        }
        union(merged.frameworks, result.frameworks);

        for (const [category, names] of Object.entries(result.dependencies)) {
            if (names.length === 0) continue;
            const existing = merged.dependencies[category] ?? [];
            union(existing, names);
            merged.dependencies[category] = existing;

            if (result.dependencyLimit !== undefined) {
                limits.set(category, Math.min(limits.get(category) ?? result.dependencyLimit, result.dependencyLimit));
            }
        }
    }

    for (const [category, limit] of limits) {
        merged.dependencies[category] = merged.dependencies[category].slice(0, limit);
    }

    return merged;
}
