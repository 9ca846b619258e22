import path from 'path';
import rules from '../data/tree-rules.json';

export const IGNORE_DIRS: ReadonlySet<string> = new Set(rules.ignoreDirs);
export const IGNORE_EXTENSIONS: ReadonlySet<string> = new Set(rules.ignoreExtensions);

const CONFIG_FILES: ReadonlySet<string> = new Set(rules.configFiles);
const ENTRY_POINTS: ReadonlySet<string> = new Set(rules.entryPoints);
const COMPOSE_FILES: ReadonlySet<string> = new Set(rules.composeFiles);
const CHANGELOG_FILES: ReadonlySet<string> = new Set(rules.changelogFiles);

const TEST_NAME = /(^test_|_test\.|\.test\.|\.spec\.|_spec\.)/;
const TEST_DIR = /(^|\/)(tests?|__tests__|specs?)\//;
const YAML_FILE = /\.ya?ml$/;

export interface TestFrameworkMarker {
    label: string;
    /** Explicit markers name one framework; weak markers (pytest) only fill an empty slot */
    explicit: boolean;
}

const TEST_FRAMEWORK_MARKERS: ReadonlyArray<{ names: string[]; marker: TestFrameworkMarker }> = [
    { names: ['jest.config.js', 'jest.config.ts', 'jest.config.mjs', 'jest.config.cjs'], marker: { label: 'Jest', explicit: true } },
    { names: ['vitest.config.ts', 'vitest.config.js', 'vitest.config.mts'], marker: { label: 'Vitest', explicit: true } },
    { names: ['phpunit.xml', 'phpunit.xml.dist'], marker: { label: 'PHPUnit', explicit: true } },
    { names: ['.rspec'], marker: { label: 'RSpec', explicit: true } },
    { names: ['karma.conf.js'], marker: { label: 'Karma', explicit: true } },
    { names: ['cypress.config.ts', 'cypress.config.js'], marker: { label: 'Cypress', explicit: true } },
    { names: ['playwright.config.ts', 'playwright.config.js'], marker: { label: 'Playwright', explicit: true } },
    { names: ['pytest.ini', 'conftest.py', 'tox.ini'], marker: { label: 'pytest', explicit: false } },
];

const CI_PROVIDERS: ReadonlyArray<{ provider: string; matches: (lowerName: string, relPath: string) => boolean }> = [
    { provider: 'GitHub Actions', matches: (_name, rel) => rel.startsWith('.github/workflows/') },
    { provider: 'Travis CI', matches: (name) => name === '.travis.yml' || name === '.travis.yaml' },
    { provider: 'Jenkins', matches: (name) => name === 'jenkinsfile' || name === 'jenkins.yml' },
    { provider: 'GitLab CI', matches: (name) => name === '.gitlab-ci.yml' },
    { provider: 'Azure Pipelines', matches: (name) => name === 'azure-pipelines.yml' },
    { provider: 'CircleCI', matches: (_name, rel) => rel === '.circleci/config.yml' },
    { provider: 'Bitbucket Pipelines', matches: (name) => name === 'bitbucket-pipelines.yml' },
];

/**
 * Everything the walker learns from one file path
 */
export interface FileClassification {
    relPath: string;
    /** First path segment, absent for files at the root */
    topDir?: string;
    extension: string;
    /** Binary or lock file: not counted, not classified further */
    ignored: boolean;
    isTest: boolean;
    testFramework?: TestFrameworkMarker;
    ciProvider?: string;
    isDocker: boolean;
    isK8s: boolean;
    isRootReadme: boolean;
    isContributing: boolean;
    isChangelog: boolean;
    isLicense: boolean;
    isConfig: boolean;
    isEntryPoint: boolean;
}

function isLicenseName(lower: string): boolean {
    return lower === 'license'
        || lower === 'licence'
        || lower === 'copying'
        || lower.startsWith('license.')
        || lower.startsWith('licence.');
}

/**
 * Classify a file by its POSIX path relative to the repository root
 */
export function classifyFile(relPath: string): FileClassification {
    const fileName = path.posix.basename(relPath);
    const lower = fileName.toLowerCase();
    const lowerRel = relPath.toLowerCase();
    const slash = relPath.indexOf('/');
    const topDir = slash > 0 ? relPath.slice(0, slash) : undefined;
    const extension = path.posix.extname(fileName).toLowerCase();

    const classification: FileClassification = {
        relPath,
        topDir,
        extension,
        ignored: IGNORE_EXTENSIONS.has(extension),
        isTest: false,
        isDocker: false,
        isK8s: false,
        isRootReadme: false,
        isContributing: false,
        isChangelog: false,
        isLicense: false,
        isConfig: false,
        isEntryPoint: false,
    };
    if (classification.ignored) {
        return classification;
    }

    classification.isTest = TEST_NAME.test(lower) || TEST_DIR.test(lowerRel);
    classification.testFramework = TEST_FRAMEWORK_MARKERS.find(m => m.names.includes(lower))?.marker;
    classification.ciProvider = CI_PROVIDERS.find(ci => ci.matches(lower, relPath))?.provider;

    classification.isDocker = lower.startsWith('dockerfile') || COMPOSE_FILES.has(lower);
    classification.isK8s = YAML_FILE.test(lower) && rules.k8sKeywords.some(kw => lower.includes(kw));

    classification.isRootReadme = lower === 'readme.md' && topDir === undefined;
    classification.isContributing = lower === 'contributing.md';
    classification.isChangelog = CHANGELOG_FILES.has(lower);
    classification.isLicense = isLicenseName(lower);

    classification.isConfig = CONFIG_FILES.has(lower);
    classification.isEntryPoint = ENTRY_POINTS.has(lower);

    return classification;
}
