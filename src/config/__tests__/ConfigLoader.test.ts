import fs from 'fs';
import os from 'os';
import path from 'path';
import { ConfigLoader, toAnalyzeOptions } from '../ConfigLoader';
import { DEFAULT_CONFIG } from '../schema';
import logger from '../../utils/logger';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const ENV_KEYS = ['REPOLENS_GIT_TIMEOUT_MS', 'REPOLENS_DEADLINE_MS', 'REPOLENS_SKIP_HISTORY', 'REPOLENS_MANIFEST_MAX_BYTES'];

describe('ConfigLoader', () => {
  let dir: string;

  function writeConfig(content: string): string {
    const configPath = path.join(dir, '.repolens.yml');
    fs.writeFileSync(configPath, content);
    return configPath;
  }

  beforeEach(() => {
    jest.clearAllMocks();
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-loader-'));
    ENV_KEYS.forEach(key => delete process.env[key]);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
    ENV_KEYS.forEach(key => delete process.env[key]);
  });

  it('merges a config file over the defaults section by section', async () => {
    const configPath = writeConfig('history:\n  recent_commits: 5\nwalk:\n  extra_ignore_dirs: [fixtures]\n');
    const loader = new ConfigLoader();

    const config = await loader.load(configPath);

    expect(config.history).toEqual({ ...DEFAULT_CONFIG.history, recent_commits: 5 });
    expect(config.walk.extra_ignore_dirs).toEqual(['fixtures']);
    expect(config.manifests).toEqual(DEFAULT_CONFIG.manifests);
    expect(loader.getDiagnostics()).toEqual({ configSource: configPath, overridesApplied: [] });
  });

  it('treats an empty file as no overrides', async () => {
    const config = await new ConfigLoader().load(writeConfig(''));

    expect(config).toEqual(DEFAULT_CONFIG);
  });

  it('falls back to defaults when the file cannot be read', async () => {
    const config = await new ConfigLoader().load(path.join(dir, 'missing.yml'));

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(logger.warn).toHaveBeenCalledTimes(1);
  });

  it('applies environment overrides after the file', async () => {
    process.env.REPOLENS_GIT_TIMEOUT_MS = '2500';
    process.env.REPOLENS_SKIP_HISTORY = 'true';
    const loader = new ConfigLoader();

    const config = await loader.load(writeConfig('history:\n  timeout_ms: 9000\n'));

    expect(config.history.timeout_ms).toBe(2500);
    expect(config.history.enabled).toBe(false);
    expect(loader.getDiagnostics().overridesApplied).toEqual(['REPOLENS_GIT_TIMEOUT_MS', 'REPOLENS_SKIP_HISTORY']);
  });

  it('rejects limits that are not positive integers', async () => {
    await expect(new ConfigLoader().load(writeConfig('manifests:\n  max_bytes: -1\n')))
      .rejects.toThrow('Invalid configuration: manifests.max_bytes must be a positive integer (got -1)');

    process.env.REPOLENS_DEADLINE_MS = 'soon';
    await expect(new ConfigLoader().load(writeConfig('')))
      .rejects.toThrow('Invalid configuration: analysis.deadline_ms must be a positive integer (got NaN)');
  });

  it('rejects ignore dirs that are not a list of names', async () => {
    await expect(new ConfigLoader().load(writeConfig('walk:\n  extra_ignore_dirs: fixtures\n')))
      .rejects.toThrow('Invalid configuration: walk.extra_ignore_dirs must be a list of directory names');
  });
});

describe('toAnalyzeOptions', () => {
  it('maps every section onto analyzer options', () => {
    expect(toAnalyzeOptions(DEFAULT_CONFIG)).toEqual({
      extraIgnoreDirs: [],
      manifestMaxBytes: 50000,
      keyFiles: { maxBytes: 8000, readmeExcerptChars: 2000 },
      history: { timeoutMs: 10000, recentCommits: 30, maxContributors: 10, messageLength: 120 },
      deadlineMs: undefined,
    });
  });

  it('turns disabled history into false', () => {
    const options = toAnalyzeOptions({ ...DEFAULT_CONFIG, history: { ...DEFAULT_CONFIG.history, enabled: false } });

    expect(options.history).toBe(false);
  });
});
