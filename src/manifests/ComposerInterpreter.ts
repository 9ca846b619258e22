import {
    ManifestInterpreter,
    PartialManifestResult,
    addFrameworksByName,
    emptyManifestResult,
    frameworkTable,
    isRecord,
} from './ManifestInterpreter';

const PHP_FRAMEWORKS = frameworkTable('composer');
const MAX_PACKAGES = 20;

// Platform requirements rather than packages
function isPlatformRequirement(name: string): boolean {
    return name === 'php' || name.startsWith('php-') || name.startsWith('ext-') || name.startsWith('lib-');
}

/**
 * composer.json
 */
export class ComposerInterpreter implements ManifestInterpreter {
    readonly packageManager = 'Composer';

    async parse(text: string): Promise<PartialManifestResult> {
        const composer: unknown = JSON.parse(text);
        if (!isRecord(composer)) {
            throw new Error('composer.json is not a JSON object');
        }

        const result = emptyManifestResult(this.packageManager);
        if (typeof composer.description === 'string' && composer.description) {
            result.description = composer.description;
        }

        const names: string[] = [];
        for (const key of ['require', 'require-dev']) {
            const requirements = composer[key];
            if (isRecord(requirements)) names.push(...Object.keys(requirements));
        }

        addFrameworksByName(result.frameworks, names, PHP_FRAMEWORKS);
        const packages = names.filter(name => !isPlatformRequirement(name));
        if (packages.length > 0) {
            result.dependencies.composer = packages.slice(0, MAX_PACKAGES);
            result.dependencyLimit = MAX_PACKAGES;
        }
        return result;
    }
}
