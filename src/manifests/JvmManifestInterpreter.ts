import { parseStringPromise } from 'xml2js';
import {
    ManifestInterpreter,
    PartialManifestResult,
    addUnique,
    emptyManifestResult,
    frameworkTable,
    isRecord,
} from './ManifestInterpreter';

const JVM_FRAMEWORKS = frameworkTable('jvm');
const JVM_PACKAGE_MANAGER = 'Maven/Gradle';
const MAX_ARTIFACTS = 20;

// implementation 'g:a:v', testImplementation("g:a:v"), ...
const GRADLE_DEPENDENCY = /\b(?:implementation|api|compileOnly|runtimeOnly|testImplementation|testRuntimeOnly|annotationProcessor|kapt)\s*\(?\s*['"]([^'":\s]+):([^'":\s]+)(?::[^'"]*)?['"]/g;

/**
 * Build files mention frameworks in plugin ids, parents and artifacts alike,
 * so the whole text is searched
 */
function detectJvmFrameworks(text: string, frameworks: string[]): void {
    const lower = text.toLowerCase();
    for (const [pattern, framework] of JVM_FRAMEWORKS) {
        if (lower.includes(pattern)) addUnique(frameworks, framework);
    }
}

/**
 * xml2js puts every child element in an array; text-only elements are strings,
 * elements with attributes are objects holding the text under `_`
 */
function childText(node: Record<string, unknown>, key: string): string | undefined {
    const children = node[key];
    if (!Array.isArray(children)) return undefined;

    const first: unknown = children[0];
    if (typeof first === 'string') return first.trim();
    if (isRecord(first) && typeof first._ === 'string') return first._.trim();
    return undefined;
}

function childNodes(node: Record<string, unknown>, key: string): Record<string, unknown>[] {
    const children = node[key];
    return Array.isArray(children) ? children.filter(isRecord) : [];
}

/**
 * pom.xml
 */
export class MavenPomInterpreter implements ManifestInterpreter {
    readonly packageManager = JVM_PACKAGE_MANAGER;

    async parse(text: string): Promise<PartialManifestResult> {
        const document: unknown = await parseStringPromise(text);
        if (!isRecord(document) || !isRecord(document.project)) {
            throw new Error('pom.xml has no <project> root');
        }
        const project = document.project;

        const result = emptyManifestResult(this.packageManager);
        const description = childText(project, 'description');
        if (description) result.description = description;

        const artifacts: string[] = [];
        const dependencyLists = [
            ...childNodes(project, 'dependencies'),
            ...childNodes(project, 'dependencyManagement').flatMap(dm => childNodes(dm, 'dependencies')),
        ];
        for (const list of dependencyLists) {
            for (const dependency of childNodes(list, 'dependency')) {
                const groupId = childText(dependency, 'groupId');
                const artifactId = childText(dependency, 'artifactId');
                if (groupId && artifactId) addUnique(artifacts, `${groupId}:${artifactId}`);
            }
        }

        detectJvmFrameworks(text, result.frameworks);
        if (artifacts.length > 0) {
            result.dependencies.jvm = artifacts.slice(0, MAX_ARTIFACTS);
            result.dependencyLimit = MAX_ARTIFACTS;
        }
        return result;
    }
}

/**
 * build.gradle and build.gradle.kts
 */
export class GradleInterpreter implements ManifestInterpreter {
    readonly packageManager = JVM_PACKAGE_MANAGER;

    async parse(text: string): Promise<PartialManifestResult> {
        const result = emptyManifestResult(this.packageManager);

        const artifacts: string[] = [];
        for (const match of text.matchAll(GRADLE_DEPENDENCY)) {
            addUnique(artifacts, `${match[1]}:${match[2]}`);
        }

        detectJvmFrameworks(text, result.frameworks);
        if (artifacts.length > 0) {
            result.dependencies.jvm = artifacts.slice(0, MAX_ARTIFACTS);
            result.dependencyLimit = MAX_ARTIFACTS;
        }
        return result;
    }
}
