import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import { WorkingDirectoryManager } from '../../core/work-dir';
import { GitIndex } from '../../core/index';
import { BlobObject } from '../../core/objects';
import { WorkingTreeConflictException } from '../../core/exceptions';
import type { GitRepository } from '../../core/repo';
import {
  initRepository,
  openRepository,
  writeCommit,
  writeWorkingFiles,
} from '../helpers/repository-fixture';

describe('WorkingDirectoryManager', () => {
  let tmpRoot: string;
  let workDir: string;
  let repository: GitRepository;
  let manager: WorkingDirectoryManager;
  let first: string;
  let second: string;

  const read = (relative: string) => fs.readFile(path.join(workDir, relative), 'utf8');
  const exists = (relative: string) => fs.pathExists(path.join(workDir, relative));
  const indexPaths = async () =>
    (await GitIndex.read(path.join(workDir, '.git', 'index'))).entries.map((e) => e.filePath);

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'work-dir-'));
    workDir = path.join(tmpRoot, 'work');
    await initRepository(workDir);
    repository = await openRepository(workDir, tmpRoot);
    manager = new WorkingDirectoryManager(repository);

    first = await writeCommit(repository, {
      'README.md': 'one',
      'src/app.ts': 'x:run',
      'docs/old.md': 'old',
    });
    second = await writeCommit(
      repository,
      { 'README.md': 'two', 'src/app.ts': 'x:run', 'src/new.ts': 'new' },
      [first]
    );
  });

  afterEach(async () => {
    await repository.close();
    await fs.remove(tmpRoot);
  });

  it('checks out a commit into an empty working directory', async () => {
    const summary = await manager.update(null, first);

    expect(summary).toEqual({ created: 3, modified: 0, deleted: 0 });
    expect(await read('README.md')).toBe('one');
    expect((await fs.stat(path.join(workDir, 'src', 'app.ts'))).mode & 0o111).not.toBe(0);
    expect(await indexPaths()).toEqual(['README.md', 'docs/old.md', 'src/app.ts']);
  });

  it('applies only the differences between two commits', async () => {
    await manager.update(null, first);

    const summary = await manager.update(first, second);

    expect(summary).toEqual({ created: 1, modified: 1, deleted: 1 });
    expect(await read('README.md')).toBe('two');
    expect(await read('src/new.ts')).toBe('new');
    expect(await exists('docs')).toBe(false);
    expect(await indexPaths()).toEqual(['README.md', 'src/app.ts', 'src/new.ts']);
  });

  it('does nothing between identical snapshots', async () => {
    await manager.update(null, first);
    const same = await writeCommit(
      repository,
      { 'README.md': 'one', 'src/app.ts': 'x:run', 'docs/old.md': 'old' },
      [first]
    );

    expect(await manager.update(first, same)).toEqual({ created: 0, modified: 0, deleted: 0 });
  });

  it('refuses to overwrite local modifications and touches nothing', async () => {
    await manager.update(null, first);
    await writeWorkingFiles(workDir, { 'README.md': 'dirty' });

    await expect(manager.update(first, second)).rejects.toThrow(
      new WorkingTreeConflictException(['README.md'])
    );
    expect(await read('README.md')).toBe('dirty');
    expect(await exists('src/new.ts')).toBe(false);
    expect(await exists('docs/old.md')).toBe(true);
  });

  it('accepts a file that already holds the new content', async () => {
    await manager.update(null, first);
    await writeWorkingFiles(workDir, { 'README.md': 'two' });

    await expect(manager.update(first, second)).resolves.toEqual({
      created: 1,
      modified: 1,
      deleted: 1,
    });
  });

  it('refuses to overwrite an untracked file in the way', async () => {
    await manager.update(null, first);
    await writeWorkingFiles(workDir, { 'src/new.ts': 'mine' });

    await expect(manager.update(first, second)).rejects.toThrow(
      new WorkingTreeConflictException(['src/new.ts'])
    );
  });

  it('refuses to drop staged changes', async () => {
    await manager.update(null, first);
    const indexPath = path.join(workDir, '.git', 'index');
    const index = await GitIndex.read(indexPath);
    const staged = index.getEntry('README.md');
    if (!staged) throw new Error('README.md is not in the index');
    staged.contentHash = new BlobObject(Buffer.from('staged')).sha();
    await fs.remove(indexPath);
    await index.write(indexPath);

    await expect(manager.update(first, second)).rejects.toThrow(WorkingTreeConflictException);
    expect(await read('README.md')).toBe('one');
  });

  it('needs a working tree', async () => {
    const bareDir = path.join(tmpRoot, 'bare.git');
    await initRepository(bareDir, { bare: true });
    const bare = await openRepository(bareDir, tmpRoot);

    expect(() => new WorkingDirectoryManager(bare)).toThrow('this operation must be run in a work tree');
    await bare.close();
  });
});
