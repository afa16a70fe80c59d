import type { RepositoryStore } from './repository-store';
import type { BranchDecision, LocalBranch } from './types';
import type { DefaultBranch } from './default-branch';

export interface DecisionContext {
  mainRemote: string;
  alternateRemote: string | null;
  defaultBranch: DefaultBranch;
  /** Branch checked out at the time of the decision. */
  currentBranch: string | null;
}

/**
 * Classifies one local branch against the state of its tracking ref.
 */
export class DecisionEngine {
  constructor(private readonly store: RepositoryStore) {}

  async decide(branch: LocalBranch, context: DecisionContext): Promise<BranchDecision> {
    const { name, target, upstream } = branch;

    if (!upstream) {
      return { kind: 'skip', branch: name, upstream: null, reason: 'no-upstream', target };
    }

    if (upstream.remote !== context.mainRemote && upstream.remote !== context.alternateRemote) {
      return { kind: 'skip', branch: name, upstream, reason: 'foreign-remote', target };
    }

    const tracking = await this.store.remoteTrackingTarget(upstream.remote, upstream.branch);
    if (tracking === target) {
      return { kind: 'skip', branch: name, upstream, reason: 'up-to-date', target };
    }

    if (tracking === null) {
      return await this.decideDeleted(branch, upstream, context);
    }

    if (await this.store.isAncestor(target, tracking)) {
      return {
        kind: 'fast-forward',
        branch: name,
        upstream,
        from: target,
        to: tracking,
        updateWorkingTree: context.currentBranch === name,
      };
    }
    return { kind: 'warn', branch: name, upstream, reason: 'diverged', target };
  }

  /**
   * The upstream branch is gone: delete the local one if its work is
   * contained in the default branch
   */
  private async decideDeleted(
    branch: LocalBranch,
    upstream: NonNullable<LocalBranch['upstream']>,
    context: DecisionContext
  ): Promise<BranchDecision> {
    const { name, target } = branch;
    const { tip, switchTarget } = context.defaultBranch;

    if (tip === null) {
      return { kind: 'warn', branch: name, upstream, reason: 'no-default-branch', target };
    }

    const mergeable = target === tip || (await this.store.isAncestor(target, tip));
    if (!mergeable) {
      return { kind: 'warn', branch: name, upstream, reason: 'unmerged', target };
    }

    if (context.currentBranch !== name) {
      return { kind: 'delete', branch: name, upstream, target };
    }

    if (switchTarget === null || switchTarget === name) {
      return { kind: 'warn', branch: name, upstream, reason: 'no-default-branch', target };
    }
    return { kind: 'switch-and-delete', to: switchTarget, from: name, upstream, target };
  }
}
