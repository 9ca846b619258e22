import {
    ManifestInterpreter,
    PartialManifestResult,
    addFrameworksByName,
    emptyManifestResult,
    frameworkTable,
} from './ManifestInterpreter';

const DESCRIPTION = /^description\s*=\s*"([^"]+)"/m;
const KEY = /^(\w[\w-]*)\s*=/gm;
const NON_DEPENDENCY_KEYS: ReadonlySet<string> = new Set(['name', 'version', 'edition', 'description', 'authors', 'license']);
const CRATE_FRAMEWORKS = frameworkTable('cargo');

/**
 * Cargo.toml, read line by line: only top-level `key =` lines matter
 */
export class CargoManifestInterpreter implements ManifestInterpreter {
    readonly packageManager = 'Cargo';

    async parse(text: string): Promise<PartialManifestResult> {
        const result = emptyManifestResult(this.packageManager);

        const description = DESCRIPTION.exec(text);
        if (description) {
            result.description = description[1];
        }

        const keys = Array.from(text.matchAll(KEY), match => match[1]);
        addFrameworksByName(result.frameworks, keys, CRATE_FRAMEWORKS);

        const crates = keys.filter(key => !NON_DEPENDENCY_KEYS.has(key));
        if (crates.length > 0) {
            result.dependencies.crates = crates;
        }

        return result;
    }
}
