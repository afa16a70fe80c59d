import type { RepositoryStore } from './repository-store';
import type { Upstream } from './types';
import { NameValidator } from './name-validator';
import { NoRemoteException } from './exceptions';

const HEADS_PREFIX = 'refs/heads/';

/**
 * Works out which remote a branch belongs to.
 *
 * The chain is `branch.<b>.remote` (with `branch.<b>.merge` naming the remote
 * branch), then `branch.<b>.pushRemote`, then `remote.pushDefault`; the latter
 * two assume the remote branch has the local branch's name.
 */
export class RemoteResolver {
  constructor(private readonly store: RepositoryStore) {}

  async upstreamOf(branch: string): Promise<Upstream | null> {
    const config = await this.store.branchConfig(branch);

    if (config.remote && config.remote.length > 0) {
      const remote = NameValidator.decode(config.remote, 'remote');
      return { remote, branch: RemoteResolver.mergedBranch(config.merge, branch) };
    }

    if (config.pushRemote && config.pushRemote.length > 0) {
      return { remote: NameValidator.decode(config.pushRemote, 'remote'), branch };
    }

    const pushDefault = await this.store.pushDefault();
    if (pushDefault && pushDefault.length > 0) {
      return { remote: NameValidator.decode(pushDefault, 'remote'), branch };
    }

    return null;
  }

  /**
   * The remote the run fetches from: the current branch's upstream remote,
   * which must also be configured
   */
  async resolveMainRemote(current: string, configuredRemotes: string[]): Promise<string> {
    const upstream = await this.upstreamOf(current);
    if (!upstream) {
      throw new NoRemoteException();
    }
    if (!configuredRemotes.includes(upstream.remote)) {
      throw new NoRemoteException(upstream.remote);
    }
    return upstream.remote;
  }

  private static mergedBranch(merge: Buffer | null, fallback: string): string {
    if (!merge || merge.length === 0) return fallback;
    const name = NameValidator.decode(merge, 'branch');
    return name.startsWith(HEADS_PREFIX) ? name.substring(HEADS_PREFIX.length) : name;
  }
}
