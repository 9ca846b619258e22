import {
    ManifestInterpreter,
    PartialManifestResult,
    addUnique,
    emptyManifestResult,
    frameworkTable,
    isRecord,
} from './ManifestInterpreter';

const DEPENDENCY_GROUPS = ['dependencies', 'devDependencies', 'peerDependencies'] as const;
const NPM_FRAMEWORKS = frameworkTable('npm');

/**
 * package.json: dependency groups kept apart, frameworks looked up over their union
 */
export class NodeManifestInterpreter implements ManifestInterpreter {
    readonly packageManager = 'npm/yarn/pnpm';

    async parse(text: string): Promise<PartialManifestResult> {
        const pkg: unknown = JSON.parse(text);
        if (!isRecord(pkg)) {
            throw new Error('package.json is not a JSON object');
        }

        const result = emptyManifestResult(this.packageManager);
        if (typeof pkg.description === 'string' && pkg.description) {
            result.description = pkg.description;
        }

        const allDeps = new Set<string>();
        for (const group of DEPENDENCY_GROUPS) {
            const deps = pkg[group];
            if (!isRecord(deps)) continue;

            const names = Object.keys(deps);
            names.forEach(name => allDeps.add(name));
            if (names.length > 0) {
                result.dependencies[group] = names;
            }
        }

        // Table order, so a repository's labels read the same whichever group declares them
        for (const [dep, framework] of NPM_FRAMEWORKS) {
            if (allDeps.has(dep)) addUnique(result.frameworks, framework);
        }

        return result;
    }
}
