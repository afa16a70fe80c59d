import chalk from 'chalk';
import { ConsoleReporter, displaySummary } from '../../../commands/sync/sync.display';
import { NO_DEFAULT_BRANCH, type SyncEvent, type SyncSummary } from '../../../core/sync';
import { display, logger } from '../../../utils';

const OLD = '1'.repeat(40);
const NEW = '2'.repeat(40);

type EventOf<K extends SyncEvent['kind']> = Extract<SyncEvent, { kind: K }>;

const base = { remote: 'origin', oldId: OLD, newId: NEW, dryRun: false };

describe('ConsoleReporter', () => {
  let log: jest.SpyInstance;
  let error: jest.SpyInstance;
  let reporter: ConsoleReporter;
  const printed = () => log.mock.calls.map((call: unknown[]) => call.join(' '));

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    error = jest.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.level = 'info';
    reporter = new ConsoleReporter();
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('holds fetch lines back and prints them aligned under the header', () => {
    const created: EventOf<'remote-ref-created'> = {
      ...base,
      kind: 'remote-ref-created',
      branch: 'new',
      oldId: null,
    };
    const updated: EventOf<'remote-ref-updated'> = {
      ...base,
      kind: 'remote-ref-updated',
      branch: 'main',
      forced: false,
    };
    const deleted: EventOf<'remote-ref-deleted'> = {
      ...base,
      kind: 'remote-ref-deleted',
      branch: 'feature/old',
      newId: null,
    };
    reporter.emit(created);
    reporter.emit(updated);
    reporter.emit(deleted);
    expect(log).not.toHaveBeenCalled();

    reporter.resolved({
      currentBranch: 'topic',
      mainRemote: 'origin',
      defaultBranch: {
        name: 'main',
        source: 'remote-head',
        alternateRemote: null,
        tip: NEW,
        switchTarget: 'main',
      },
    });

    expect(printed()).toEqual([
      'current branch: topic',
      'default remote: origin',
      'remote default: origin/main',
      '',
      ' * [new branch]' + ' '.repeat(6) + 'new' + ' '.repeat(4) + '-> origin/new',
      '   1111111..2222222' + ' '.repeat(2) + 'main' + ' '.repeat(3) + '-> origin/main',
      ' - [deleted]' + ' '.repeat(9) + '(none) -> origin/feature/old',
      '',
    ]);
  });

  it('prints fetch lines directly once resolved', () => {
    reporter.resolved({ currentBranch: 'main', mainRemote: 'origin', defaultBranch: NO_DEFAULT_BRANCH });
    log.mockClear();

    reporter.emit({ ...base, kind: 'remote-ref-updated', branch: 'main', forced: true });

    expect(printed()).toEqual([' + 1111111...2222222 main -> origin/main  (forced update)']);
  });

  it('describes local branch changes', () => {
    reporter.emit({ ...base, kind: 'updated', branch: 'main', workingTreeUpdated: false });
    reporter.emit({ ...base, kind: 'updated', branch: 'dev', workingTreeUpdated: false, dryRun: true });
    reporter.emit({
      ...base,
      kind: 'switched-and-deleted',
      branch: 'topic',
      switchedTo: 'main',
      newId: null,
    });
    reporter.emit({ ...base, kind: 'deleted', branch: 'old', newId: null });
    reporter.emit({ ...base, kind: 'new-remote-branch', branch: 'fresh', oldId: null });

    expect(printed()).toEqual([
      'Updated branch main (was 1111111).',
      '(dry run) Updated branch dev (was 1111111).',
      "Switched to branch 'main'",
      'Deleted branch topic (was 1111111).',
      'Deleted branch old (was 1111111).',
      'origin/fresh is new and has no local branch',
    ]);
  });

  it('words each warning', () => {
    const warning = (
      branch: string,
      reason: EventOf<'warning'>['reason']
    ): EventOf<'warning'> => ({ ...base, kind: 'warning', branch, reason, defaultBranch: 'main' });

    reporter.emit(warning('main', 'diverged'));
    reporter.emit(warning('topic', 'unmerged'));
    reporter.emit(warning('spike', 'no-default-branch'));

    expect(printed()).toEqual([
      "warning: 'main' seems to contain unpushed commits",
      "warning: 'topic' was deleted on origin, but appears not merged into 'main'",
      "warning: no default branch, skipping to delete 'spike'",
    ]);
  });

  it('keeps skipped branches to debug output', () => {
    reporter.emit({ ...base, kind: 'skipped', branch: 'main', reason: 'up-to-date' });
    expect(log).not.toHaveBeenCalled();

    logger.level = 'debug';
    reporter.emit({ ...base, kind: 'skipped', branch: 'main', reason: 'up-to-date' });
    expect(printed()).toEqual(['[DEBUG] main: skipped (up-to-date)']);
  });

  it('reports failures on stderr', () => {
    reporter.emit({
      ...base,
      kind: 'failed',
      branch: 'main',
      action: 'fast-forward',
      error: new Error('boom'),
    });

    expect(error).toHaveBeenCalledWith("✗ failed to update 'main': boom");
  });

  it('names where the default branch came from', () => {
    const resolution = (name: string | null, source: 'remote-head' | 'local-master') => ({
      currentBranch: 'x',
      mainRemote: 'upstream',
      defaultBranch: { ...NO_DEFAULT_BRANCH, name, source },
    });

    expect(ConsoleReporter.defaultBranchText(resolution('trunk', 'remote-head'))).toBe(
      'upstream/trunk'
    );
    expect(ConsoleReporter.defaultBranchText(resolution('master', 'local-master'))).toBe(
      'master (local)'
    );
    expect(ConsoleReporter.defaultBranchText(resolution(null, 'remote-head'))).toBe('(none)');
  });
});

describe('displaySummary', () => {
  const summary = (overrides: Partial<SyncSummary> = {}): SyncSummary => ({
    currentBranch: 'topic',
    mainRemote: 'origin',
    defaultBranch: NO_DEFAULT_BRANCH,
    finalBranch: 'topic',
    dryRun: false,
    counts: {
      'remote-ref-created': 0,
      'remote-ref-updated': 1,
      'remote-ref-deleted': 1,
      'new-remote-branch': 2,
      updated: 1,
      deleted: 1,
      'switched-and-deleted': 1,
      skipped: 3,
      warning: 0,
      failed: 0,
    },
    ...overrides,
  });

  const rows = (failed: number) => [
    `${'updated:'.padEnd(16)}1`,
    `${'deleted:'.padEnd(16)}2`,
    `${'new remote:'.padEnd(16)}2`,
    `${'warnings:'.padEnd(16)}0`,
    `${'failed:'.padEnd(16)}${failed}`,
  ];

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(() => {
    logger.level = 'info';
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('tallies a clean run', () => {
    const success = jest.spyOn(display, 'success').mockImplementation(() => undefined);

    displaySummary(summary({ finalBranch: 'main' }));

    expect(success).toHaveBeenCalledWith([...rows(0), '', 'now on: main'].join('\n'), 'sync');
  });

  it('marks a dry run', () => {
    const success = jest.spyOn(display, 'success').mockImplementation(() => undefined);

    displaySummary(summary({ dryRun: true }));

    expect(success).toHaveBeenCalledWith(
      [...rows(0), '', 'dry run: no local branch was changed'].join('\n'),
      'sync (dry run)'
    );
  });

  it('warns when something failed', () => {
    const warning = jest.spyOn(display, 'warning').mockImplementation(() => undefined);
    const base = summary();

    displaySummary({ ...base, counts: { ...base.counts, failed: 1 } });

    expect(warning).toHaveBeenCalledWith(rows(1).join('\n'), 'sync finished with failures');
  });

  it('stays quiet below info level', () => {
    const success = jest.spyOn(display, 'success').mockImplementation(() => undefined);
    logger.level = 'error';

    displaySummary(summary());

    expect(success).not.toHaveBeenCalled();
  });
});
