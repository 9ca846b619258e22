import fs from 'fs';
import os from 'os';
import path from 'path';
import { readKeyFiles } from '../KeyFileReader';

jest.mock('../../utils/logger', () => ({
  __esModule: true,
  default: { info: jest.fn(), warn: jest.fn(), error: jest.fn(), debug: jest.fn() },
}));

describe('readKeyFiles', () => {
  let root: string;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'key-files-'));
  });

  afterEach(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  it('captures only the key files that exist', async () => {
    fs.writeFileSync(path.join(root, 'go.mod'), 'module example.com/demo\n');
    fs.writeFileSync(path.join(root, 'notes.md'), 'ignored');

    const capture = await readKeyFiles(root);

    expect(capture.contents).toEqual({ 'go.mod': 'module example.com/demo\n' });
    expect(capture.readmeExcerpt).toBe('');
    expect(capture.issues).toEqual([]);
  });

  it('bounds file contents and the README excerpt separately', async () => {
    fs.writeFileSync(path.join(root, 'README.md'), 'abcdefghij');

    const capture = await readKeyFiles(root, { maxBytes: 8, readmeExcerptChars: 3 });

    expect(capture.contents['README.md']).toBe('abcdefgh');
    expect(capture.readmeExcerpt).toBe('abc');
  });

  it('finds the README whatever its letter case', async () => {
    fs.writeFileSync(path.join(root, 'Readme.md'), '# Demo\n');

    const capture = await readKeyFiles(root);

    expect(capture.contents).toEqual({ 'Readme.md': '# Demo\n' });
    expect(capture.readmeExcerpt).toBe('# Demo\n');
  });
});
