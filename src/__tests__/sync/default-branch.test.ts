import { DefaultBranchDetector, type LocalBranch } from '../../core/sync';
import { InMemoryStore } from './in-memory-store';

describe('DefaultBranchDetector', () => {
  let store: InMemoryStore;
  let detector: DefaultBranchDetector;

  beforeEach(() => {
    store = new InMemoryStore();
    detector = new DefaultBranchDetector(store);
  });

  test('uses the remote HEAD and the local branch tracking it', async () => {
    store.remoteHeads.set('origin', Buffer.from('trunk'));
    store.tracking.set('origin/trunk', 'c2');
    const locals: LocalBranch[] = [
      { name: 'mine', target: 'c1', upstream: { remote: 'origin', branch: 'trunk' } },
      { name: 'main', target: 'c0', upstream: { remote: 'origin', branch: 'main' } },
    ];

    expect(await detector.detect('origin', locals)).toEqual({
      name: 'trunk',
      source: 'remote-head',
      alternateRemote: null,
      tip: 'c2',
      switchTarget: 'mine',
    });
  });

  test('prefers the tracking branch named like the default branch', async () => {
    store.remoteHeads.set('origin', Buffer.from('trunk'));
    const locals: LocalBranch[] = [
      { name: 'a-trunk', target: 'c1', upstream: { remote: 'origin', branch: 'trunk' } },
      { name: 'trunk', target: 'c1', upstream: { remote: 'origin', branch: 'trunk' } },
    ];

    const detected = await detector.detect('origin', locals);
    expect(detected.switchTarget).toBe('trunk');
    expect(detected.tip).toBeNull();
  });

  test('falls back to a local main and its upstream remote', async () => {
    store.tracking.set('upstream/main', 'u1');
    const locals: LocalBranch[] = [
      { name: 'master', target: 'c0', upstream: null },
      { name: 'main', target: 'c1', upstream: { remote: 'upstream', branch: 'main' } },
    ];

    expect(await detector.detect('origin', locals)).toEqual({
      name: 'main',
      source: 'local-main',
      alternateRemote: 'upstream',
      tip: 'u1',
      switchTarget: 'main',
    });
  });

  test('uses the local master target when it has no tracking ref', async () => {
    const locals: LocalBranch[] = [
      { name: 'master', target: 'c0', upstream: { remote: 'origin', branch: 'master' } },
    ];

    expect(await detector.detect('origin', locals)).toEqual({
      name: 'master',
      source: 'local-master',
      alternateRemote: null,
      tip: 'c0',
      switchTarget: 'master',
    });
  });

  test('finds nothing without a remote HEAD or main/master', async () => {
    const detected = await detector.detect('origin', [
      { name: 'develop', target: 'c0', upstream: { remote: 'origin', branch: 'develop' } },
    ]);
    expect(detected.name).toBeNull();
    expect(detected.tip).toBeNull();
  });
});
