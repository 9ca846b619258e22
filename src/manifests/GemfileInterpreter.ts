import {
    ManifestInterpreter,
    PartialManifestResult,
    addFrameworksByName,
    emptyManifestResult,
    frameworkTable,
} from './ManifestInterpreter';

const GEM = /gem\s+['"]([^'"]+)['"]/g;
const RUBY_FRAMEWORKS = frameworkTable('ruby');
const MAX_GEMS = 20;

/**
 * Gemfile: the first quoted argument of each `gem` call
 */
export class GemfileInterpreter implements ManifestInterpreter {
    readonly packageManager = 'Bundler';

    async parse(text: string): Promise<PartialManifestResult> {
        const result = emptyManifestResult(this.packageManager);
        const gems = Array.from(text.matchAll(GEM), match => match[1]);

        addFrameworksByName(result.frameworks, gems, RUBY_FRAMEWORKS);
        if (gems.length > 0) {
            result.dependencies.gems = gems.slice(0, MAX_GEMS);
            result.dependencyLimit = MAX_GEMS;
        }
        return result;
    }
}
