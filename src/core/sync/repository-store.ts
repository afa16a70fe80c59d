import type { BranchConfig, BranchRef, ObjectId } from './types';

/**
 * Everything the reconciliation engine reads from or changes in a
 * repository. Names come back as raw bytes; the engine validates them.
 */
export interface RepositoryStore {
  /** Branch HEAD points at, or null when HEAD is detached. */
  currentBranch(): Promise<Buffer | null>;

  localBranches(): Promise<BranchRef[]>;

  remoteNames(): Promise<Buffer[]>;

  branchConfig(branch: string): Promise<BranchConfig>;

  pushDefault(): Promise<Buffer | null>;

  /** Tracking branches of `remote`, excluding its HEAD pointer. */
  remoteTrackingBranches(remote: string): Promise<BranchRef[]>;

  remoteTrackingTarget(remote: string, branch: string): Promise<ObjectId | null>;

  /** Branch named by `refs/remotes/<remote>/HEAD`, or null without one. */
  remoteDefaultBranch(remote: string): Promise<Buffer | null>;

  /** True when `ancestor` equals `descendant` or is reachable from it. */
  isAncestor(ancestor: ObjectId, descendant: ObjectId): Promise<boolean>;

  updateRef(branch: string, to: ObjectId, expected: ObjectId): Promise<void>;

  /** Move the working tree and index of the current branch between commits. */
  updateWorkingTree(from: ObjectId, to: ObjectId): Promise<void>;

  /** Refuses to delete the current branch. */
  deleteRef(branch: string, expected: ObjectId): Promise<void>;

  /** Switch working tree, index and HEAD to `branch`. */
  checkout(branch: string): Promise<void>;

  close(): Promise<void>;
}
