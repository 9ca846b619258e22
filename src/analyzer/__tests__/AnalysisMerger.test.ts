import { mergeManifestResults } from '../AnalysisMerger';

describe('mergeManifestResults', () => {
  it('returns empty values for no manifests', () => {
    expect(mergeManifestResults([])).toEqual({
      description: '',
      frameworks: [],
      packageManagers: [],
      dependencies: {},
    });
  });

  it('keeps the first description it sees', () => {
    const merged = mergeManifestResults([
      { dependencies: {}, frameworks: [] },
      { description: 'from package.json', dependencies: {}, frameworks: [] },
      { description: 'from pyproject', dependencies: {}, frameworks: [] },
    ]);

    expect(merged.description).toBe('from package.json');
  });

  it('unions frameworks, package managers and dependency categories in order', () => {
    const merged = mergeManifestResults([
      {
        packageManager: 'pip',
        dependencies: { python: ['flask', 'requests'] },
        frameworks: ['Flask'],
      },
      {
        packageManager: 'pip',
        dependencies: { python: ['requests', 'celery'], empty: [] },
        frameworks: ['Celery', 'Flask'],
      },
      {
        packageManager: 'npm/yarn/pnpm',
        dependencies: { dependencies: ['react'] },
        frameworks: ['React'],
      },
    ]);

    expect(merged.packageManagers).toEqual(['pip', 'npm/yarn/pnpm']);
    expect(merged.frameworks).toEqual(['Flask', 'Celery', 'React']);
    expect(merged.dependencies).toEqual({
      python: ['flask', 'requests', 'celery'],
      dependencies: ['react'],
    });
  });

  it('cuts a merged category back to the interpreter limit', () => {
    const names = (prefix: string): string[] => Array.from({ length: 20 }, (_, i) => `${prefix}${i}`);

    const merged = mergeManifestResults([
      { packageManager: 'pip', dependencies: { python: names('req') }, dependencyLimit: 20, frameworks: [] },
      { packageManager: 'pip', dependencies: { python: names('proj') }, dependencyLimit: 20, frameworks: [] },
    ]);

    expect(merged.dependencies.python).toHaveLength(20);
    expect(merged.dependencies.python).toEqual(names('req'));
  });

  it('leaves categories without a limit whole', () => {
    const merged = mergeManifestResults([
      { dependencies: { dependencies: ['a', 'b'] }, frameworks: [] },
      { dependencies: { dependencies: ['c'] }, frameworks: [] },
    ]);

    expect(merged.dependencies.dependencies).toEqual(['a', 'b', 'c']);
  });
});
