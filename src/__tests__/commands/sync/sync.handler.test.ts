import path from 'path';
import os from 'os';
import fs from 'fs-extra';
import inquirer from 'inquirer';
import {
  runSync,
  terminalCredentials,
  type SyncRunOptions,
} from '../../../commands/sync/sync.handler';
import { CollectingSink } from '../../../core/sync';
import type { GitRepository } from '../../../core/repo';
import { WorkingDirectoryManager } from '../../../core/work-dir';
import {
  initRepository,
  isolatedConfig,
  openRepository,
  writeCommit,
} from '../../helpers/repository-fixture';
import { spinner } from '../../../utils/spinner';

jest.mock('inquirer', () => ({ prompt: jest.fn() }));

const LOCAL_CONFIG = [
  '[remote "origin"]',
  '\turl = ../remote',
  '\tfetch = +refs/heads/*:refs/remotes/origin/*',
  '[branch "main"]',
  '\tremote = origin',
  '\tmerge = refs/heads/main',
  '[branch "topic"]',
  '\tremote = origin',
  '\tmerge = refs/heads/topic',
  '',
].join('\n');

describe('runSync', () => {
  let tmpRoot: string;
  let localDir: string;
  let remote: GitRepository;
  let main1: string;
  let topic1: string;
  let main2: string;

  const eventsOf = (sink: CollectingSink) =>
    sink.events.map((event) => [event.kind, event.branch, event.dryRun]);

  const sync = async (sink: CollectingSink, options: Partial<SyncRunOptions> = {}) =>
    await runSync({
      cwd: localDir,
      reporter: sink,
      configLocations: isolatedConfig(tmpRoot),
      credentials: { next: async () => null },
      ...options,
    });

  const inspect = async <T>(body: (local: GitRepository) => Promise<T>): Promise<T> => {
    const local = await openRepository(localDir, tmpRoot);
    try {
      return await body(local);
    } finally {
      await local.close();
    }
  };

  beforeEach(async () => {
    tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), 'sync-handler-'));
    const remoteDir = path.join(tmpRoot, 'remote');
    localDir = path.join(tmpRoot, 'local');

    await initRepository(remoteDir);
    remote = await openRepository(remoteDir, tmpRoot);
    main1 = await writeCommit(remote, { 'README.md': 'one' });
    topic1 = await writeCommit(remote, { 'README.md': 'one', 'topic.txt': 'work' }, [main1]);
    main2 = await writeCommit(remote, { 'README.md': 'two', 'topic.txt': 'work' }, [topic1]);
    await remote.refs().updateRef('refs/heads/main', main1, null);
    await remote.refs().updateRef('refs/heads/topic', topic1, null);

    await initRepository(localDir, { head: 'topic', config: LOCAL_CONFIG });
    await fs.copy(path.join(remoteDir, '.git', 'objects'), path.join(localDir, '.git', 'objects'));
    await inspect(async (local) => {
      const refs = local.refs();
      await refs.updateRef('refs/heads/main', main1, null);
      await refs.updateRef('refs/heads/topic', topic1, null);
      await refs.updateRef('refs/remotes/origin/main', main1, null);
      await refs.updateRef('refs/remotes/origin/topic', topic1, null);
      await new WorkingDirectoryManager(local).update(null, topic1);
    });

    // topic was merged into main upstream and then removed
    await remote.refs().updateRef('refs/heads/main', main2, main1);
    await remote.refs().deleteRef('refs/heads/topic', topic1);
  });

  afterEach(async () => {
    await remote.close();
    await fs.remove(tmpRoot);
  });

  it('fast-forwards main and leaves the merged topic branch for main', async () => {
    const sink = new CollectingSink();

    const summary = await sync(sink);

    expect(eventsOf(sink)).toEqual([
      ['remote-ref-updated', 'main', false],
      ['remote-ref-deleted', 'topic', false],
      ['updated', 'main', false],
      ['switched-and-deleted', 'topic', false],
    ]);
    expect(summary).toMatchObject({
      currentBranch: 'topic',
      mainRemote: 'origin',
      finalBranch: 'main',
      dryRun: false,
    });
    expect(summary.defaultBranch).toEqual({
      name: 'main',
      source: 'remote-head',
      alternateRemote: null,
      tip: main2,
      switchTarget: 'main',
    });
    expect(summary.counts['switched-and-deleted']).toBe(1);

    await inspect(async (local) => {
      const refs = local.refs();
      expect(await refs.readSymbolic('HEAD')).toEqual(Buffer.from('refs/heads/main'));
      expect(await refs.resolve('refs/heads/main')).toBe(main2);
      expect(await refs.resolve('refs/heads/topic')).toBeNull();
      expect(await refs.resolve('refs/remotes/origin/topic')).toBeNull();
    });
    expect(await fs.readFile(path.join(localDir, 'README.md'), 'utf8')).toBe('two');
  });

  it('fetches but leaves local branches alone on a dry run', async () => {
    const sink = new CollectingSink();

    const summary = await sync(sink, { dryRun: true });

    expect(eventsOf(sink)).toEqual([
      ['remote-ref-updated', 'main', false],
      ['remote-ref-deleted', 'topic', false],
      ['updated', 'main', true],
      ['switched-and-deleted', 'topic', true],
    ]);
    expect(summary.dryRun).toBe(true);
    expect(summary.finalBranch).toBe('main');

    await inspect(async (local) => {
      const refs = local.refs();
      expect(await refs.resolve('refs/remotes/origin/main')).toBe(main2);
      expect(await refs.readSymbolic('HEAD')).toEqual(Buffer.from('refs/heads/topic'));
      expect(await refs.resolve('refs/heads/main')).toBe(main1);
      expect(await refs.resolve('refs/heads/topic')).toBe(topic1);
    });
    expect(await fs.readFile(path.join(localDir, 'README.md'), 'utf8')).toBe('one');
  });

  it('reads the dry-run switch from configuration', async () => {
    const sink = new CollectingSink();

    const summary = await sync(sink, { configOverrides: ['refsync.dryRun=true'] });

    expect(summary.dryRun).toBe(true);
    await inspect(async (local) => {
      expect(await local.refs().resolve('refs/heads/topic')).toBe(topic1);
    });
  });

  it('keeps the tracking ref of a removed branch without pruning', async () => {
    const sink = new CollectingSink();

    const summary = await sync(sink, { prune: false });

    expect(eventsOf(sink)).toEqual([
      ['remote-ref-updated', 'main', false],
      ['updated', 'main', false],
      ['skipped', 'topic', false],
    ]);
    expect(summary.finalBranch).toBe('topic');

    await inspect(async (local) => {
      const refs = local.refs();
      expect(await refs.resolve('refs/heads/main')).toBe(main2);
      expect(await refs.resolve('refs/remotes/origin/topic')).toBe(topic1);
      expect(await refs.readSymbolic('HEAD')).toEqual(Buffer.from('refs/heads/topic'));
    });
  });
});

describe('terminalCredentials', () => {
  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('stops the fetch spinner before prompting', async () => {
    const stop = jest.spyOn(spinner, 'stop');
    const prompt = jest.mocked(inquirer.prompt);
    prompt.mockResolvedValue({ username: 'dev', password: 'test-secret' });

    const credentials = await terminalCredentials({ interactive: true }, {}).next(
      'https://example.com/r.git'
    );

    expect(credentials).toEqual({ username: 'dev', password: 'test-secret' });
    expect(stop).toHaveBeenCalledTimes(1);
    expect(stop.mock.invocationCallOrder[0]).toBeLessThan(
      prompt.mock.invocationCallOrder[0] ?? 0
    );
  });
});
