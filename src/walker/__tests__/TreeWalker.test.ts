import fs from 'fs';
import os from 'os';
import path from 'path';
import { TreeWalker } from '../TreeWalker';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

function writeTree(root: string, files: Record<string, string>): void {
  for (const [relPath, content] of Object.entries(files)) {
    const filePath = path.join(root, relPath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
  }
}

describe('TreeWalker', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'tree-walker-'));
    writeTree(root, {
      'package.json': '{}',
      'README.md': '# demo',
      'conftest.py': '',
      'jest.config.js': 'module.exports = {};',
      'Dockerfile': 'FROM node:20',
      'src/index.ts': 'export {};',
      'src/app.test.ts': 'test("x", () => {});',
      'tests/test_util.py': 'def test_x(): pass',
      '.github/workflows/ci.yml': 'on: push',
      'assets/logo.png': 'not really a png',
      'node_modules/dep/index.js': 'module.exports = 1;',
    });
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('counts files and directories, skipping ignored ones', async () => {
    const summary = await new TreeWalker().walk(root);

    expect(summary.totalFiles).toBe(9);
    // src, tests, .github, .github/workflows, assets
    expect(summary.totalDirs).toBe(5);
    expect(Object.fromEntries(summary.topDirCounts)).toEqual({ '.github': 1, src: 2, tests: 1 });
    expect(summary.topLevelDirs).toEqual(['.github', 'assets', 'src', 'tests']);
    expect(Object.fromEntries(summary.extensionCounts)).toEqual({
      '.json': 1,
      '.md': 1,
      '.py': 2,
      '.js': 1,
      '.ts': 2,
      '.yml': 1,
    });
    expect(summary.issues).toEqual([]);
  });

  it('counts test files in one pass and leaves src out of test dirs', async () => {
    const summary = await new TreeWalker().walk(root);

    expect(summary.hasTests).toBe(true);
    expect(summary.testFileCount).toBe(2);
    expect(summary.testDirs).toEqual(['tests']);
  });

  it('lets an explicit framework marker replace pytest', async () => {
    const summary = await new TreeWalker().walk(root);

    expect(summary.testFramework).toBe('Jest');
  });

  it('collects infrastructure and documentation signals', async () => {
    const summary = await new TreeWalker().walk(root);

    expect(summary.hasCi).toBe(true);
    expect(summary.ciPlatform).toBe('GitHub Actions');
    expect(summary.ciFiles).toEqual(['.github/workflows/ci.yml']);
    expect(summary.hasDocker).toBe(true);
    expect(summary.dockerFiles).toEqual(['Dockerfile']);
    expect(summary.hasK8s).toBe(false);
    expect(summary.hasReadme).toBe(true);
    expect(summary.hasLicense).toBe(false);
    expect(summary.entryPoints).toEqual(['src/index.ts']);
  });

  it('prunes extra ignored directories', async () => {
    const summary = await new TreeWalker({ extraIgnoreDirs: ['tests'] }).walk(root);

    expect(summary.totalFiles).toBe(8);
    expect(summary.testFileCount).toBe(1);
    expect(summary.testDirs).toEqual([]);
  });

  it('stops with a diagnostic once the deadline has passed', async () => {
    const summary = await new TreeWalker({ signal: AbortSignal.abort() }).walk(root);

    expect(summary.totalFiles).toBe(0);
    expect(summary.issues).toHaveLength(1);
    expect(summary.issues[0]).toMatchObject({ stage: 'walk', kind: 'WALK_DEADLINE_EXCEEDED' });
  });

  it('returns an empty summary for an empty directory', async () => {
    const empty = fs.mkdtempSync(path.join(os.tmpdir(), 'tree-walker-empty-'));
    try {
      const summary = await new TreeWalker().walk(empty);

      expect(summary.totalFiles).toBe(0);
      expect(summary.totalDirs).toBe(0);
      expect(summary.hasTests).toBe(false);
      expect(summary.hasCi).toBe(false);
    } finally {
      fs.rmSync(empty, { recursive: true, force: true });
    }
  });

  describe('on a separate tree', () => {
    let other: string;

    beforeEach(() => {
      other = fs.mkdtempSync(path.join(os.tmpdir(), 'tree-walker-other-'));
    });

    afterEach(() => {
      fs.rmSync(other, { recursive: true, force: true });
    });

    it('counts files named like ignored directories', async () => {
      writeTree(other, {
        'build': 'make all',
        'scripts/build': '#!/bin/sh',
        'scripts/env': 'FOO=bar',
        'a.py': 'print(1)',
        'dist/bundle.js': 'module.exports = 1;',
      });

      const summary = await new TreeWalker().walk(other);

      expect(summary.totalFiles).toBe(4);
      expect(summary.totalDirs).toBe(1);
      expect(Object.fromEntries(summary.topDirCounts)).toEqual({ scripts: 2 });
      expect(summary.topLevelDirs).toEqual(['scripts']);
    });

    it('keeps the first CI platform and lists every CI file', async () => {
      writeTree(other, {
        '.github/workflows/ci.yml': 'on: push',
        '.travis.yml': 'language: node_js',
      });

      const summary = await new TreeWalker().walk(other);

      expect(summary.hasCi).toBe(true);
      expect(summary.ciPlatform).toBe('GitHub Actions');
      expect(summary.ciFiles).toEqual(['.github/workflows/ci.yml', '.travis.yml']);
    });
  });
});
