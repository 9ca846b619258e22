export interface PatternInput {
    topLevelDirs: ReadonlySet<string>;
    frameworks: readonly string[];
    extensions: ReadonlySet<string>;
    description: string;
    configFiles: readonly string[];
}

interface PatternRule {
    pattern: string;
    matches: (input: PatternInput) => boolean;
}

const hasAny = (dirs: ReadonlySet<string>, ...names: string[]): boolean => names.some(name => dirs.has(name));
const hasAll = (dirs: ReadonlySet<string>, ...names: string[]): boolean => names.every(name => dirs.has(name));

/**
 * Evaluated in declaration order, which is also output order
 */
const PATTERN_RULES: readonly PatternRule[] = [
    // Web app patterns
    { pattern: 'Web application', matches: ({ topLevelDirs: d }) => hasAll(d, 'src', 'public') || hasAll(d, 'app', 'public') },
    {
        pattern: 'Server-side rendering (SSR)',
        matches: ({ topLevelDirs: d, frameworks }) => hasAny(d, 'pages', 'app') && frameworks.includes('Next.js'),
    },
    { pattern: 'REST API', matches: ({ topLevelDirs: d }) => hasAny(d, 'api', 'routes') },
    { pattern: 'Middleware pattern', matches: ({ topLevelDirs: d }) => d.has('middleware') },
    { pattern: 'Component-based architecture', matches: ({ topLevelDirs: d }) => d.has('components') },

    // Backend patterns
    { pattern: 'Model layer', matches: ({ topLevelDirs: d }) => hasAny(d, 'models', 'schemas', 'entities') },
    { pattern: 'MVC / Handler pattern', matches: ({ topLevelDirs: d }) => hasAny(d, 'controllers', 'handlers') },
    { pattern: 'Service layer', matches: ({ topLevelDirs: d }) => d.has('services') },
    { pattern: 'Repository pattern', matches: ({ topLevelDirs: d }) => hasAny(d, 'repositories', 'repos') },
    {
        pattern: 'Hexagonal / Clean architecture',
        matches: ({ topLevelDirs: d }) =>
            hasAll(d, 'domain', 'application', 'infrastructure') || hasAll(d, 'domain', 'ports', 'adapters'),
    },
    { pattern: 'Go cmd pattern (multi-binary)', matches: ({ topLevelDirs: d }) => d.has('cmd') },
    { pattern: 'Go project layout', matches: ({ topLevelDirs: d }) => hasAny(d, 'internal', 'pkg') },
    {
        pattern: 'Rust workspace (multi-crate)',
        matches: ({ topLevelDirs: d, description }) => d.has('crates') || description.toLowerCase().includes('workspace'),
    },
    {
        pattern: 'Protocol Buffers / gRPC',
        matches: ({ topLevelDirs: d, extensions }) => hasAny(d, 'proto', 'protos') || extensions.has('.proto'),
    },
    { pattern: 'Database migrations', matches: ({ topLevelDirs: d }) => d.has('migrations') },

    // Monorepo patterns
    { pattern: 'Monorepo', matches: ({ topLevelDirs: d }) => hasAny(d, 'packages', 'apps') },
    {
        pattern: 'Lerna monorepo',
        matches: ({ configFiles }) => configFiles.some(file => file.split('/').pop() === 'lerna.json'),
    },

    // Plugin / extension patterns
    { pattern: 'Plugin architecture', matches: ({ topLevelDirs: d }) => hasAny(d, 'plugins', 'extensions') },

    // Documentation
    { pattern: 'Documentation site', matches: ({ topLevelDirs: d }) => hasAny(d, 'docs', 'documentation') },
    { pattern: 'Example/sample code included', matches: ({ topLevelDirs: d }) => hasAny(d, 'examples', 'samples') },
];

export const KNOWN_PATTERNS: readonly string[] = PATTERN_RULES.map(rule => rule.pattern);

/**
 * Infer architectural patterns from structure. Every rule is independent.
 */
export function detectPatterns(input: PatternInput): string[] {
    return PATTERN_RULES.filter(rule => rule.matches(input)).map(rule => rule.pattern);
}
