import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { FileUtils } from '../../utils';

describe('FileUtils', () => {
  let tmpDir: string;

  beforeEach(async () => {
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'file-utils-'));
  });

  afterEach(async () => {
    await fs.remove(tmpDir);
  });

  test('reads a missing file as null', async () => {
    await expect(FileUtils.readFileIfExists(path.join(tmpDir, 'missing'))).resolves.toBeNull();
    await expect(FileUtils.statIfExists(path.join(tmpDir, 'missing', 'deeper'))).resolves.toBeNull();
    await expect(FileUtils.exists(path.join(tmpDir, 'missing'))).resolves.toBe(false);
  });

  test('reads an existing file', async () => {
    await fs.writeFile(path.join(tmpDir, 'present'), 'content');

    const content = await FileUtils.readFileIfExists(path.join(tmpDir, 'present'));

    expect(content?.toString()).toBe('content');
  });

  test('still fails on errors other than a missing path', async () => {
    await expect(FileUtils.readFileIfExists(tmpDir)).rejects.toMatchObject({ code: 'EISDIR' });
  });

  test('takes the error code from any object that carries one', () => {
    expect(FileUtils.errorCode({ code: 'ENOENT' })).toBe('ENOENT');
    expect(FileUtils.errorCode({ code: 2 })).toBeUndefined();
    expect(FileUtils.errorCode('ENOENT')).toBeUndefined();
    expect(FileUtils.errorCode(null)).toBeUndefined();
    expect(FileUtils.isNotFound({ code: 'ENOTDIR' })).toBe(true);
  });
});
