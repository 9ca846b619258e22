import yaml from 'js-yaml';
import {
    ManifestInterpreter,
    PartialManifestResult,
    addFrameworksByName,
    emptyManifestResult,
    frameworkTable,
    isRecord,
} from './ManifestInterpreter';

const DART_FRAMEWORKS = frameworkTable('pub');

/**
 * pubspec.yaml (Dart and Flutter)
 */
export class PubspecInterpreter implements ManifestInterpreter {
    readonly packageManager = 'pub';

    async parse(text: string): Promise<PartialManifestResult> {
        const pubspec: unknown = yaml.load(text);
        if (!isRecord(pubspec)) {
            throw new Error('pubspec.yaml is not a mapping');
        }

        const result = emptyManifestResult(this.packageManager);
        if (typeof pubspec.description === 'string' && pubspec.description.trim()) {
            result.description = pubspec.description.trim();
        }

        const groups: Array<[string, string]> = [['dependencies', 'pub'], ['dev_dependencies', 'dev_pub']];
        for (const [key, category] of groups) {
            const deps = pubspec[key];
            if (!isRecord(deps)) continue;

            const names = Object.keys(deps);
            addFrameworksByName(result.frameworks, names, DART_FRAMEWORKS);
            if (names.length > 0) result.dependencies[category] = names;
        }

        return result;
    }
}
