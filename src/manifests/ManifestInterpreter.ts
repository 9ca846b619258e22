import frameworkTables from '../data/frameworks.json';

/**
 * What one manifest contributes before it is merged into the analysis
 */
export interface PartialManifestResult {
    packageManager?: string;
    description?: string;
    /** Ecosystem grouping (dependencies, devDependencies, crates, gems, ...) -> names */
    dependencies: Record<string, string[]>;
    /** Cap the interpreter applied to each category; merged categories are cut back to it */
    dependencyLimit?: number;
    frameworks: string[];
}

/**
 * One dependency ecosystem's manifest format
 */
export interface ManifestInterpreter {
    /**
     * Package manager tag reported for this ecosystem
     */
    readonly packageManager: string;

    /**
     * Parse manifest text. May throw on malformed input; the registry isolates failures.
     */
    parse(text: string): Promise<PartialManifestResult>;
}

export type FrameworkEcosystem = keyof typeof frameworkTables;

/**
 * Dependency name (or prefix) -> framework label, in table order
 */
export function frameworkTable(ecosystem: FrameworkEcosystem): ReadonlyMap<string, string> {
    return new Map(Object.entries(frameworkTables[ecosystem]));
}

export function emptyManifestResult(packageManager?: string): PartialManifestResult {
    return packageManager
        ? { packageManager, dependencies: {}, frameworks: [] }
        : { dependencies: {}, frameworks: [] };
}

export function addUnique(list: string[], value: string): void {
    if (!list.includes(value)) list.push(value);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Add the label of every name found in `table`, in the order the names appear
 */
export function addFrameworksByName(
    frameworks: string[],
    names: Iterable<string>,
    table: ReadonlyMap<string, string>
): void {
    for (const name of names) {
        const label = table.get(name);
        if (label) addUnique(frameworks, label);
    }
}
