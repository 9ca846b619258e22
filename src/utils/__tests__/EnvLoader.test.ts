import fs from 'fs';
import os from 'os';
import path from 'path';
import { EnvLoader } from '../EnvLoader';

jest.mock('../logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

const ORIGINAL_ENV = { ...process.env };

describe('EnvLoader', () => {
  let cwdDir: string;
  let homeDir: string;

  beforeEach(() => {
    cwdDir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-loader-cwd-'));
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'env-loader-home-'));
    jest.spyOn(process, 'cwd').mockReturnValue(cwdDir);
    jest.spyOn(os, 'homedir').mockReturnValue(homeDir);
  });

  afterEach(() => {
    jest.restoreAllMocks();
    process.env = { ...ORIGINAL_ENV };
    fs.rmSync(cwdDir, { recursive: true, force: true });
    fs.rmSync(homeDir, { recursive: true, force: true });
  });

  it('loads the working directory .env and the user-level file', () => {
    fs.writeFileSync(path.join(cwdDir, '.env'), 'LOADER_TEST_LOCAL=from_cwd\n');
    fs.writeFileSync(path.join(homeDir, '.repolens.env'), 'LOADER_TEST_USER=from_home\n');

    const result = new EnvLoader().load();

    expect(process.env.LOADER_TEST_LOCAL).toBe('from_cwd');
    expect(process.env.LOADER_TEST_USER).toBe('from_home');
    expect(result.loadedFrom).toEqual([path.join(cwdDir, '.env'), path.join(homeDir, '.repolens.env')]);
    expect(result.errors).toEqual([]);
  });

  it('lets the working directory win over the user-level file', () => {
    fs.writeFileSync(path.join(cwdDir, '.env'), 'LOADER_TEST_SHARED=local\n');
    fs.writeFileSync(path.join(homeDir, '.repolens.env'), 'LOADER_TEST_SHARED=user\n');

    new EnvLoader().load();

    expect(process.env.LOADER_TEST_SHARED).toBe('local');
  });

  it('reports what it tried when no file exists', () => {
    const result = new EnvLoader().load();

    expect(result.loadedFrom).toEqual([]);
    expect(result.tried).toEqual([path.join(cwdDir, '.env'), path.join(homeDir, '.repolens.env')]);
  });
});
