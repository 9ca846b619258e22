import {
    ManifestInterpreter,
    PartialManifestResult,
    addFrameworksByName,
    addUnique,
    emptyManifestResult,
    frameworkTable,
} from './ManifestInterpreter';

// {:phoenix, "~> 1.7"} inside deps/0
const DEP_TUPLE = /\{\s*:(\w+)\s*,/g;
const DESCRIPTION = /description:\s*"([^"]+)"/;
const ELIXIR_FRAMEWORKS = frameworkTable('hex');
const MAX_PACKAGES = 20;

/**
 * mix.exs (Elixir)
 */
export class MixInterpreter implements ManifestInterpreter {
    readonly packageManager = 'Mix';

    async parse(text: string): Promise<PartialManifestResult> {
        const result = emptyManifestResult(this.packageManager);

        const description = DESCRIPTION.exec(text);
        if (description) result.description = description[1];

        const packages: string[] = [];
        for (const match of text.matchAll(DEP_TUPLE)) addUnique(packages, match[1]);

        addFrameworksByName(result.frameworks, packages, ELIXIR_FRAMEWORKS);
        if (packages.length > 0) {
            result.dependencies.hex = packages.slice(0, MAX_PACKAGES);
            result.dependencyLimit = MAX_PACKAGES;
        }
        return result;
    }
}
