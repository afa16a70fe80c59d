import type { CredentialProvider } from '@/core/transport/credentials';

export type ObjectId = string;

/**
 * Branch configuration as stored: `branch.<name>.remote`, `.merge` and
 * `.pushRemote`, each absent or raw bytes.
 */
export interface BranchConfig {
  remote: Buffer | null;
  merge: Buffer | null;
  pushRemote: Buffer | null;
}

export interface BranchRef {
  name: Buffer;
  target: ObjectId;
}

export interface Upstream {
  remote: string;
  branch: string;
}

export interface RemoteRefChange {
  branch: Buffer;
  oldId: ObjectId | null;
  newId: ObjectId | null;
}

/**
 * How a fetch changed the tracking refs of one remote
 */
export type RefChanges = RemoteRefChange[];

export interface RemoteFetcher {
  fetch(remote: string, credentials: CredentialProvider): Promise<RefChanges>;
}

export type SkipReason = 'no-upstream' | 'foreign-remote' | 'up-to-date';
export type WarningReason = 'diverged' | 'unmerged' | 'no-default-branch';

export type BranchDecision =
  | { kind: 'skip'; branch: string; upstream: Upstream | null; reason: SkipReason; target: ObjectId }
  | {
      kind: 'fast-forward';
      branch: string;
      upstream: Upstream;
      from: ObjectId;
      to: ObjectId;
      updateWorkingTree: boolean;
    }
  | { kind: 'delete'; branch: string; upstream: Upstream; target: ObjectId }
  | {
      kind: 'switch-and-delete';
      /** Branch checked out before `from` is deleted. */
      to: string;
      from: string;
      upstream: Upstream;
      target: ObjectId;
    }
  | { kind: 'warn'; branch: string; upstream: Upstream; reason: WarningReason; target: ObjectId };

export type DecisionKind = BranchDecision['kind'];

interface EventBase {
  branch: string;
  remote: string | null;
  oldId: ObjectId | null;
  newId: ObjectId | null;
  dryRun: boolean;
}

export type SyncEvent =
  | (EventBase & { kind: 'remote-ref-created' })
  | (EventBase & { kind: 'remote-ref-updated'; forced: boolean })
  | (EventBase & { kind: 'remote-ref-deleted' })
  | (EventBase & { kind: 'new-remote-branch' })
  | (EventBase & { kind: 'updated'; workingTreeUpdated: boolean })
  | (EventBase & { kind: 'deleted' })
  | (EventBase & { kind: 'switched-and-deleted'; switchedTo: string })
  | (EventBase & { kind: 'skipped'; reason: SkipReason })
  | (EventBase & { kind: 'warning'; reason: WarningReason; defaultBranch: string | null })
  | (EventBase & { kind: 'failed'; action: DecisionKind; error: Error });

export type SyncEventKind = SyncEvent['kind'];

export interface ReportingSink {
  emit(event: SyncEvent): void;
}

/**
 * A local branch after validation, with its resolved upstream
 */
export interface LocalBranch {
  name: string;
  target: ObjectId;
  upstream: Upstream | null;
}
