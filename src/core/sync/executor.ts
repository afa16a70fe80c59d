import { GitException } from '@/core/exceptions';
import type { RepositoryStore } from './repository-store';
import type { BranchDecision, ReportingSink } from './types';

/**
 * Run state that outlives a single decision: a switch-and-delete moves HEAD,
 * and later branches must see the new current branch.
 */
export interface SyncState {
  current: string;
}

export interface ExecutorOptions {
  dryRun: boolean;
  /** Default branch named in warnings. */
  defaultBranch: string | null;
}

/**
 * Applies one decision to the store and reports what happened. Store
 * failures become a `failed` event for that branch; the run goes on.
 */
export class Executor {
  constructor(
    private readonly store: RepositoryStore,
    private readonly sink: ReportingSink,
    private readonly options: ExecutorOptions
  ) {}

  async apply(decision: BranchDecision, state: SyncState): Promise<void> {
    try {
      await this.run(decision, state);
    } catch (error) {
      if (!(error instanceof GitException)) throw error;
      this.sink.emit({
        kind: 'failed',
        action: decision.kind,
        error,
        branch: decision.kind === 'switch-and-delete' ? decision.from : decision.branch,
        remote: decision.upstream?.remote ?? null,
        oldId: decision.kind === 'fast-forward' ? decision.from : decision.target,
        newId: decision.kind === 'fast-forward' ? decision.to : null,
        dryRun: this.options.dryRun,
      });
    }
  }

  private async run(decision: BranchDecision, state: SyncState): Promise<void> {
    const { dryRun } = this.options;

    switch (decision.kind) {
      case 'skip':
        this.sink.emit({
          kind: 'skipped',
          reason: decision.reason,
          branch: decision.branch,
          remote: decision.upstream?.remote ?? null,
          oldId: decision.target,
          newId: decision.target,
          dryRun,
        });
        return;

      case 'warn':
        this.sink.emit({
          kind: 'warning',
          reason: decision.reason,
          defaultBranch: this.options.defaultBranch,
          branch: decision.branch,
          remote: decision.upstream.remote,
          oldId: decision.target,
          newId: decision.target,
          dryRun,
        });
        return;

      case 'fast-forward':
        if (!dryRun) {
          await this.fastForward(decision);
        }
        this.sink.emit({
          kind: 'updated',
          workingTreeUpdated: decision.updateWorkingTree,
          branch: decision.branch,
          remote: decision.upstream.remote,
          oldId: decision.from,
          newId: decision.to,
          dryRun,
        });
        return;

      case 'delete':
        if (!dryRun) {
          await this.store.deleteRef(decision.branch, decision.target);
        }
        this.sink.emit({
          kind: 'deleted',
          branch: decision.branch,
          remote: decision.upstream.remote,
          oldId: decision.target,
          newId: null,
          dryRun,
        });
        return;

      case 'switch-and-delete':
        if (!dryRun) {
          await this.store.checkout(decision.to);
        }
        state.current = decision.to;
        if (!dryRun) {
          await this.store.deleteRef(decision.from, decision.target);
        }
        this.sink.emit({
          kind: 'switched-and-deleted',
          switchedTo: decision.to,
          branch: decision.from,
          remote: decision.upstream.remote,
          oldId: decision.target,
          newId: null,
          dryRun,
        });
        return;
    }
  }

  /**
   * Move the branch, and the work tree with it when it is checked out. A
   * failed ref update puts the work tree back on the old commit.
   */
  private async fastForward(
    decision: Extract<BranchDecision, { kind: 'fast-forward' }>
  ): Promise<void> {
    const { branch, from, to } = decision;
    if (!decision.updateWorkingTree) {
      await this.store.updateRef(branch, to, from);
      return;
    }

    await this.store.updateWorkingTree(from, to);
    try {
      await this.store.updateRef(branch, to, from);
    } catch (error) {
      await this.store.updateWorkingTree(to, from);
      throw error;
    }
  }
}
