import {
    ManifestInterpreter,
    PartialManifestResult,
    addUnique,
    emptyManifestResult,
    frameworkTable,
} from './ManifestInterpreter';

/**
 * `requirements`: one requirement per line (requirements.txt).
 * `declarative`: requirements appear as quoted strings, one per line or in
 * inline arrays, or as keys under a `[...dependencies]` table (pyproject.toml, setup.py).
 */
export type PythonManifestStyle = 'requirements' | 'declarative';

const PY_FRAMEWORKS = frameworkTable('python');
const IDENTIFIER = /^([A-Za-z0-9_.-]+)/;
const DESCRIPTION = /^\s*description\s*=\s*["']([^"'\n]+)["']/m;
const KEY_ASSIGNMENT = /^([\w.-]+)\s*=(.*)$/;
const QUOTED = /["']([^"']+)["']/g;
const TABLE_HEADER = /^\[+\s*([^\]]+?)\s*\]+/;
const REQUIREMENT_KEY = /(requires?|dependencies)$/;
const TRIM = /^[\s"',]+|[\s"',]+$/g;
const MAX_DEPENDENCIES = 20;

export class PythonManifestInterpreter implements ManifestInterpreter {
    readonly packageManager = 'pip';

    constructor(private readonly style: PythonManifestStyle) {}

    async parse(text: string): Promise<PartialManifestResult> {
        const result = emptyManifestResult(this.packageManager);

        if (this.style === 'declarative') {
            const description = DESCRIPTION.exec(text);
            if (description) result.description = description[1];
        }

        const found = new Set<string>();
        for (const candidate of this.candidates(text)) {
            const requirement = candidate.replace(TRIM, '');
            if (!requirement) continue;

            const lower = requirement.toLowerCase();
            for (const [pkg, framework] of PY_FRAMEWORKS) {
                if (lower.startsWith(pkg)) addUnique(result.frameworks, framework);
            }

            const identifier = IDENTIFIER.exec(requirement);
            if (identifier) found.add(identifier[1]);
        }

        if (found.size > 0) {
            result.dependencies.python = Array.from(found).slice(0, MAX_DEPENDENCIES);
            result.dependencyLimit = MAX_DEPENDENCIES;
        }
        return result;
    }

    private *candidates(text: string): Generator<string> {
        let inDependencyTable = false;
        // Key of a multi-line array still open, e.g. `install_requires=[`
        let openArrayKey: string | undefined;

        for (const rawLine of text.split('\n')) {
            const line = rawLine.trim();
            if (!line || line.startsWith('#')) continue;

            if (this.style === 'requirements') {
                // -r other.txt, -e ., --index-url ...
                if (line.startsWith('-')) continue;
                yield line.replace(/\s+#.*$/, '');
                continue;
            }

            if (line.startsWith(']')) {
                openArrayKey = undefined;
                continue;
            }

            const header = TABLE_HEADER.exec(line);
            if (header && openArrayKey === undefined) {
                inDependencyTable = header[1].endsWith('dependencies');
                continue;
            }

            const assignment = KEY_ASSIGNMENT.exec(line);
            if (assignment) {
                const key = assignment[1];
                const value = assignment[2].trim();
                openArrayKey = undefined;

                if (value.startsWith('[')) {
                    if (!value.includes(']')) openArrayKey = key;
                    if (this.holdsRequirements(key, inDependencyTable)) {
                        for (const match of value.matchAll(QUOTED)) yield match[1];
                    }
                } else if (inDependencyTable && key !== 'python') {
                    // Poetry style: the key is the package
                    yield key;
                }
                continue;
            }

            if ((line.startsWith('"') || line.startsWith("'"))
                && (openArrayKey === undefined || this.holdsRequirements(openArrayKey, inDependencyTable))) {
                yield line;
            }
        }
    }

    private holdsRequirements(key: string, inDependencyTable: boolean): boolean {
        return inDependencyTable || REQUIREMENT_KEY.test(key);
    }
}
