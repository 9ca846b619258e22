import { ManifestInterpreter, PartialManifestResult, addUnique, emptyManifestResult } from './ManifestInterpreter';

const PACKAGE_URL = /\.package\(.*?url:\s*"([^"]+)"/g;

/**
 * Package.swift: the repository name of each `.package(url:)` dependency
 */
export class SwiftPackageInterpreter implements ManifestInterpreter {
    readonly packageManager = 'Swift Package Manager';

    async parse(text: string): Promise<PartialManifestResult> {
        const result = emptyManifestResult(this.packageManager);

        const packages: string[] = [];
        for (const match of text.matchAll(PACKAGE_URL)) {
            const segments = match[1].replace(/\/+$/, '').split('/');
            const name = (segments[segments.length - 1] ?? '').replace(/\.git$/, '');
            if (!name) continue;

            addUnique(packages, name);
            addUnique(result.frameworks, name);
        }

        if (packages.length > 0) {
            result.dependencies.swift = packages;
        }
        return result;
    }
}
