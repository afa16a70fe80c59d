import type { CredentialProvider } from '@/core/transport/credentials';
import type { RepositoryStore } from './repository-store';
import type { ObjectId, RefChanges, RemoteFetcher, ReportingSink } from './types';
import { GitException } from '@/core/exceptions';
import { FetchException } from './exceptions';
import { NameValidator } from './name-validator';

/**
 * Fetches the main remote and reports how its tracking refs moved.
 */
export class FetchOrchestrator {
  constructor(
    private readonly fetcher: RemoteFetcher,
    private readonly store: RepositoryStore,
    private readonly sink: ReportingSink
  ) {}

  async fetch(remote: string, credentials: CredentialProvider): Promise<RefChanges> {
    let changes: RefChanges;
    try {
      changes = await this.fetcher.fetch(remote, credentials);
    } catch (error) {
      throw new FetchException(remote, error);
    }

    for (const change of changes) {
      const branch = NameValidator.decode(change.branch, 'branch');
      const base = { branch, remote, oldId: change.oldId, newId: change.newId, dryRun: false };

      if (change.oldId === null) {
        this.sink.emit({ ...base, kind: 'remote-ref-created' });
      } else if (change.newId === null) {
        this.sink.emit({ ...base, kind: 'remote-ref-deleted' });
      } else {
        const forced = !(await this.descends(change.oldId, change.newId));
        this.sink.emit({ ...base, kind: 'remote-ref-updated', forced });
      }
    }
    return changes;
  }

  /**
   * Whether `newId` descends from `oldId`; history that cannot be read counts
   * as a forced update
   */
  private async descends(oldId: ObjectId, newId: ObjectId): Promise<boolean> {
    try {
      return await this.store.isAncestor(oldId, newId);
    } catch (error) {
      if (!(error instanceof GitException)) throw error;
      return false;
    }
  }
}
