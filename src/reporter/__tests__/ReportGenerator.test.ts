import fs from 'fs';
import os from 'os';
import path from 'path';
import { RepoAnalysis } from '../../models/RepoAnalysis';
import { ReportGenerator } from '../ReportGenerator';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function makeAnalysis(overrides: Partial<RepoAnalysis> = {}): RepoAnalysis {
  return {
    path: '/work/shop',
    name: 'shop',
    description: '',
    totalFiles: 0,
    totalDirs: 0,
    topDirs: {},
    fileExtensions: {},
    languages: {},
    frameworks: [],
    packageManagers: [],
    dependencies: {},
    hasTests: false,
    testFramework: '',
    testDirs: [],
    testFileCount: 0,
    hasCi: false,
    ciPlatform: '',
    ciFiles: [],
    hasDocker: false,
    dockerFiles: [],
    hasK8s: false,
    hasReadme: false,
    readmeExcerpt: '',
    hasContributing: false,
    hasChangelog: false,
    hasLicense: false,
    licenseType: '',
    recentCommits: [],
    contributors: [],
    commitCount: 0,
    firstCommitDate: '',
    lastCommitDate: '',
    patterns: [],
    entryPoints: [],
    configFiles: [],
    keyFileContents: {},
    diagnostics: [],
    ...overrides,
  };
}

const FULL = makeAnalysis({
  description: 'Demo shop',
  totalFiles: 12,
  totalDirs: 4,
  topDirs: { src: 8, tests: 2 },
  fileExtensions: { '.ts': 8, '.json': 2 },
  languages: { JSON: 20, TypeScript: 80 },
  frameworks: ['Express'],
  packageManagers: ['npm/yarn/pnpm'],
  dependencies: { dependencies: ['express'], devDependencies: ['jest'] },
  hasTests: true,
  testFramework: 'Jest',
  testDirs: ['tests'],
  testFileCount: 2,
  hasCi: true,
  ciPlatform: 'GitHub Actions',
  ciFiles: ['.github/workflows/ci.yml'],
  hasLicense: true,
  licenseType: 'MIT',
  patterns: ['REST API'],
  entryPoints: ['src/index.ts'],
  configFiles: ['tsconfig.json'],
  commitCount: 42,
  firstCommitDate: '2023-01-01',
  lastCommitDate: '2024-03-02',
  contributors: [{ name: 'Ada', commits: 30 }, { name: 'Lin', commits: 12 }],
});

describe('ReportGenerator', () => {
  const generator = new ReportGenerator();

  describe('summarizeForPrompt', () => {
    it('renders every populated field in a fixed order', () => {
      expect(generator.summarizeForPrompt(FULL).split('\n')).toEqual([
        'Repository: shop',
        'Description: Demo shop',
        'Files: 12, Directories: 4',
        'Languages: TypeScript (80%), JSON (20%)',
        'Frameworks: Express',
        'Top directories: src/ (8 files), tests/ (2 files)',
        'dependencies deps: express',
        'devDependencies deps: jest',
        'Testing: Jest, 2 test files in tests',
        'CI/CD: GitHub Actions, files: .github/workflows/ci.yml',
        'License: MIT',
        'Patterns: REST API',
        'Entry points: src/index.ts',
        'Config files: tsconfig.json',
        'Commits: 42, active 2023-01-01 to 2024-03-02',
        'Contributors: Ada (30), Lin (12)',
      ]);
    });

    it('only renders the always-present lines for an empty analysis', () => {
      expect(generator.summarizeForPrompt(makeAnalysis())).toBe('Repository: shop\nFiles: 0, Directories: 0');
    });

    it('uses placeholders when tests were found without a framework or directory', () => {
      const summary = generator.summarizeForPrompt(makeAnalysis({ hasTests: true, testFileCount: 1 }));

      expect(summary.split('\n')[2]).toBe('Testing: detected, 1 test files in various dirs');
    });

    it('renders container signals', () => {
      const summary = generator.summarizeForPrompt(makeAnalysis({
        hasDocker: true,
        dockerFiles: ['Dockerfile', 'docker-compose.yml'],
        hasK8s: true,
      }));

      expect(summary.split('\n').slice(2)).toEqual([
        'Docker: Dockerfile, docker-compose.yml',
        'Kubernetes: manifests detected',
      ]);
    });
  });

  describe('toSerializable', () => {
    it('drops empty, zero and false fields', () => {
      expect(generator.toSerializable(makeAnalysis({ totalFiles: 3, hasReadme: true }))).toEqual({
        path: '/work/shop',
        name: 'shop',
        totalFiles: 3,
        hasReadme: true,
      });
    });
  });

  describe('writeJSON', () => {
    it('writes the serializable record to a new directory', async () => {
      const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'report-generator-'));
      try {
        const jsonPath = path.join(dir, 'out', 'analysis.json');

        await generator.writeJSON(FULL, jsonPath);

        const written: unknown = JSON.parse(fs.readFileSync(jsonPath, 'utf-8'));
        expect(written).toEqual(generator.toSerializable(FULL));
        expect(fs.readFileSync(jsonPath, 'utf-8')).toBe(`${generator.toJSON(FULL)}\n`);
      } finally {
        fs.rmSync(dir, { recursive: true, force: true });
      }
    });
  });
});
