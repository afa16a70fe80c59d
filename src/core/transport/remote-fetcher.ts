import type { GitRepository } from '@/core/repo';
import { RefNames } from '@/core/refs';
import type { RefChanges, RemoteFetcher } from '@/core/sync/types';
import type { CredentialProvider } from './credentials';
import type { FetchProgress } from './transport';
import { TransportFactory } from './transport-factory';
import { logger } from '@/utils';

export interface RemoteFetcherOptions {
  prune: boolean;
  onProgress?: (progress: FetchProgress) => void;
}

/**
 * Fetches a configured remote and reports how its tracking refs changed,
 * by comparing them before and after the transfer.
 */
export class GitRemoteFetcher implements RemoteFetcher {
  constructor(
    private readonly repository: GitRepository,
    private readonly options: RemoteFetcherOptions
  ) {}

  async fetch(remote: string, credentials: CredentialProvider): Promise<RefChanges> {
    const definition = TransportFactory.remoteDefinition(this.repository, remote);
    const transport = TransportFactory.create(this.repository, definition.url);

    const before = await this.trackingRefs(remote);
    logger.debug(`fetching ${remote} from ${definition.url}`);
    await transport.fetch({
      remote,
      refspecs: definition.refspecs,
      prune: this.options.prune,
      credentials,
      onProgress: this.options.onProgress,
    });
    const after = await this.trackingRefs(remote);

    return GitRemoteFetcher.diff(before, after);
  }

  /**
   * Tracking refs of `remote` keyed by hex of the branch name bytes
   */
  private async trackingRefs(remote: string): Promise<Map<string, { name: Buffer; target: string }>> {
    const prefix = RefNames.remotePrefix(remote);
    const refs = new Map<string, { name: Buffer; target: string }>();
    for (const record of await this.repository.refs().listRefs(prefix)) {
      const name = RefNames.stripPrefix(record.name, prefix);
      if (!name || name.toString('latin1') === RefNames.REMOTE_HEAD) continue;
      refs.set(name.toString('hex'), { name, target: record.target });
    }
    return refs;
  }

  private static diff(
    before: Map<string, { name: Buffer; target: string }>,
    after: Map<string, { name: Buffer; target: string }>
  ): RefChanges {
    const changes: RefChanges = [];

    for (const [key, ref] of after) {
      const old = before.get(key);
      if (old?.target !== ref.target) {
        changes.push({ branch: ref.name, oldId: old?.target ?? null, newId: ref.target });
      }
    }
    for (const [key, ref] of before) {
      if (!after.has(key)) {
        changes.push({ branch: ref.name, oldId: ref.target, newId: null });
      }
    }

    return changes.sort((a, b) => Buffer.compare(a.branch, b.branch));
  }
}
