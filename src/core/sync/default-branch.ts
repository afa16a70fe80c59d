import type { RepositoryStore } from './repository-store';
import type { LocalBranch, ObjectId } from './types';
import { NameValidator } from './name-validator';

export type DefaultBranchSource = 'remote-head' | 'local-main' | 'local-master';

export interface DefaultBranch {
  name: string | null;
  source: DefaultBranchSource | null;
  /** Upstream remote of the local main/master when it is not the main remote. */
  alternateRemote: string | null;
  /** Commit a deleted branch must be merged into; null when unresolved. */
  tip: ObjectId | null;
  /** Local branch to check out before deleting the current branch. */
  switchTarget: string | null;
}

const FALLBACK_BRANCHES: ReadonlyArray<[string, DefaultBranchSource]> = [
  ['main', 'local-main'],
  ['master', 'local-master'],
];

export const NO_DEFAULT_BRANCH: DefaultBranch = {
  name: null,
  source: null,
  alternateRemote: null,
  tip: null,
  switchTarget: null,
};

/**
 * Finds the main remote's default branch: the `refs/remotes/<remote>/HEAD`
 * pointer when the fetch recorded one, else a local `main`, else `master`.
 */
export class DefaultBranchDetector {
  constructor(private readonly store: RepositoryStore) {}

  async detect(mainRemote: string, locals: LocalBranch[]): Promise<DefaultBranch> {
    const pointer = await this.store.remoteDefaultBranch(mainRemote);
    if (pointer) {
      return await this.fromRemoteHead(mainRemote, NameValidator.decode(pointer, 'branch'), locals);
    }

    for (const [name, source] of FALLBACK_BRANCHES) {
      const local = locals.find((branch) => branch.name === name);
      if (local) {
        return await this.fromLocalBranch(mainRemote, local, source);
      }
    }

    return NO_DEFAULT_BRANCH;
  }

  private async fromRemoteHead(
    mainRemote: string,
    name: string,
    locals: LocalBranch[]
  ): Promise<DefaultBranch> {
    const tracking = locals.filter(
      (branch) => branch.upstream?.remote === mainRemote && branch.upstream.branch === name
    );
    const switchTarget = tracking.find((branch) => branch.name === name) ?? tracking[0];

    return {
      name,
      source: 'remote-head',
      alternateRemote: null,
      tip: await this.store.remoteTrackingTarget(mainRemote, name),
      switchTarget: switchTarget?.name ?? null,
    };
  }

  private async fromLocalBranch(
    mainRemote: string,
    local: LocalBranch,
    source: DefaultBranchSource
  ): Promise<DefaultBranch> {
    const upstream = local.upstream;
    const tracked = upstream
      ? await this.store.remoteTrackingTarget(upstream.remote, upstream.branch)
      : null;

    return {
      name: local.name,
      source,
      alternateRemote: upstream && upstream.remote !== mainRemote ? upstream.remote : null,
      tip: tracked ?? local.target,
      switchTarget: local.name,
    };
  }
}
