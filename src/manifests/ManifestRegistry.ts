import path from 'path';
import { AnalysisIssue } from '../models/RepoAnalysis';
import { fileExists, readHead } from '../utils/fileUtils';
import logger from '../utils/logger';
import { CargoManifestInterpreter } from './CargoManifestInterpreter';
import { ComposerInterpreter } from './ComposerInterpreter';
import { GemfileInterpreter } from './GemfileInterpreter';
import { GoModInterpreter } from './GoModInterpreter';
import { GradleInterpreter, MavenPomInterpreter } from './JvmManifestInterpreter';
import { ManifestInterpreter, PartialManifestResult, emptyManifestResult } from './ManifestInterpreter';
import { MixInterpreter } from './MixInterpreter';
import { NodeManifestInterpreter } from './NodeManifestInterpreter';
import { PubspecInterpreter } from './PubspecInterpreter';
import { PythonManifestInterpreter } from './PythonManifestInterpreter';
import { SwiftPackageInterpreter } from './SwiftPackageInterpreter';

export type ManifestKind =
    | 'npm'
    | 'cargo'
    | 'gomod'
    | 'pyproject'
    | 'setuppy'
    | 'requirements'
    | 'gemfile'
    | 'maven'
    | 'gradle'
    | 'swiftpm'
    | 'composer'
    | 'pubspec'
    | 'mix';

/**
 * Manifest file names at the repository root, in the order they are read
 */
export const MANIFEST_FILES: ReadonlyArray<{ file: string; kind: ManifestKind }> = [
    { file: 'package.json', kind: 'npm' },
    { file: 'Cargo.toml', kind: 'cargo' },
    { file: 'go.mod', kind: 'gomod' },
    { file: 'pyproject.toml', kind: 'pyproject' },
    { file: 'setup.py', kind: 'setuppy' },
    { file: 'requirements.txt', kind: 'requirements' },
    { file: 'Gemfile', kind: 'gemfile' },
    { file: 'pom.xml', kind: 'maven' },
    { file: 'build.gradle', kind: 'gradle' },
    { file: 'build.gradle.kts', kind: 'gradle' },
    { file: 'Package.swift', kind: 'swiftpm' },
    { file: 'composer.json', kind: 'composer' },
    { file: 'pubspec.yaml', kind: 'pubspec' },
    { file: 'mix.exs', kind: 'mix' },
];

export type InterpreterTable = { readonly [K in ManifestKind]: ManifestInterpreter };

export const DEFAULT_INTERPRETERS: InterpreterTable = {
    npm: new NodeManifestInterpreter(),
    cargo: new CargoManifestInterpreter(),
    gomod: new GoModInterpreter(),
    pyproject: new PythonManifestInterpreter('declarative'),
    setuppy: new PythonManifestInterpreter('declarative'),
    requirements: new PythonManifestInterpreter('requirements'),
    gemfile: new GemfileInterpreter(),
    maven: new MavenPomInterpreter(),
    gradle: new GradleInterpreter(),
    swiftpm: new SwiftPackageInterpreter(),
    composer: new ComposerInterpreter(),
    pubspec: new PubspecInterpreter(),
    mix: new MixInterpreter(),
};

export const DEFAULT_MANIFEST_MAX_BYTES = 50000;

export interface InterpretedManifest {
    file: string;
    result: PartialManifestResult;
}

export interface ManifestScan {
    manifests: InterpretedManifest[];
    issues: AnalysisIssue[];
}

/**
 * Dispatches manifest text to its ecosystem's interpreter and contains every failure
 */
export class ManifestRegistry {
    constructor(
        private readonly interpreters: InterpreterTable = DEFAULT_INTERPRETERS,
        private readonly maxBytes: number = DEFAULT_MANIFEST_MAX_BYTES
    ) {}

    getInterpreter(kind: ManifestKind): ManifestInterpreter {
        return this.interpreters[kind];
    }

    /**
     * Interpret one manifest. A parse failure yields an empty result and an issue.
     */
    async interpret(
        kind: ManifestKind,
        text: string,
        source: string = kind
    ): Promise<{ result: PartialManifestResult; issue?: AnalysisIssue }> {
        try {
            return { result: await this.getInterpreter(kind).parse(text) };
        } catch (error) {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn(`Failed to parse ${source}: ${message}`);
            return {
                result: emptyManifestResult(),
                issue: { stage: 'manifest', kind: 'MANIFEST_PARSE_FAILED', message, source },
            };
        }
    }

    /**
     * Read and interpret every known manifest present at the repository root
     */
    async scan(root: string): Promise<ManifestScan> {
        const scan: ManifestScan = { manifests: [], issues: [] };

        for (const { file, kind } of MANIFEST_FILES) {
            const manifestPath = path.join(root, file);
            if (!(await fileExists(manifestPath))) continue;

            let text: string;
            try {
                text = await readHead(manifestPath, this.maxBytes);
            } catch (error) {
                const message = error instanceof Error ? error.message : String(error);
                logger.warn(`Failed to read ${file}: ${message}`);
                scan.issues.push({ stage: 'manifest', kind: 'MANIFEST_READ_FAILED', message, source: file });
                continue;
            }

            const { result, issue } = await this.interpret(kind, text, file);
            scan.manifests.push({ file, result });
            if (issue) scan.issues.push(issue);
            logger.debug(`Interpreted ${file}: ${result.frameworks.length} framework(s)`);
        }

        return scan;
    }
}
