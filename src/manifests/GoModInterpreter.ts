import {
    ManifestInterpreter,
    PartialManifestResult,
    addUnique,
    emptyManifestResult,
    frameworkTable,
} from './ManifestInterpreter';

// Tab-indented lines inside require ( ... ) blocks, or a single-line require
const MODULE_LINE = /^(?:\t|require[ \t]+)([\w./-]+)\s/gm;
const GO_FRAMEWORKS = frameworkTable('go');
const MAX_MODULES = 20;

/**
 * go.mod: module paths matched against framework prefixes
 */
export class GoModInterpreter implements ManifestInterpreter {
    readonly packageManager = 'Go modules';

    async parse(text: string): Promise<PartialManifestResult> {
        const result = emptyManifestResult(this.packageManager);
        const modules = Array.from(text.matchAll(MODULE_LINE), match => match[1]);

        for (const module of modules) {
            for (const [prefix, framework] of GO_FRAMEWORKS) {
                if (module.startsWith(prefix)) addUnique(result.frameworks, framework);
            }
        }

        if (modules.length > 0) {
            result.dependencies.go_modules = modules.slice(0, MAX_MODULES);
            result.dependencyLimit = MAX_MODULES;
        }
        return result;
    }
}
