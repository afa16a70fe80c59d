import { GitException, RefException } from '@/core/exceptions';
import { RepositoryException, type Repository } from '@/core/repo';
import { RefNames } from '@/core/refs';
import { CommitGraph } from '@/core/history';
import { WorkingDirectoryManager } from '@/core/work-dir';
import type { RepositoryStore } from './repository-store';
import type { BranchConfig, BranchRef, ObjectId } from './types';

/**
 * RepositoryStore over a repository in Git's on-disk format
 */
export class GitRepositoryStore implements RepositoryStore {
  private readonly graph: CommitGraph;

  constructor(private readonly repository: Repository) {
    this.graph = new CommitGraph(repository);
  }

  async currentBranch(): Promise<Buffer | null> {
    return await this.guard('read HEAD', async () => {
      const target = await this.repository.refs().readSymbolic(RefNames.HEAD);
      return target ? RefNames.stripPrefix(target, RefNames.HEADS_PREFIX) : null;
    });
  }

  async localBranches(): Promise<BranchRef[]> {
    return await this.guard('list branches', () => this.listUnder(RefNames.HEADS_PREFIX));
  }

  async remoteNames(): Promise<Buffer[]> {
    return this.repository.config().subsections('remote');
  }

  async branchConfig(branch: string): Promise<BranchConfig> {
    const config = this.repository.config();
    const raw = (name: string): Buffer | null => config.get('branch', branch, name)?.raw ?? null;
    return { remote: raw('remote'), merge: raw('merge'), pushRemote: raw('pushremote') };
  }

  async pushDefault(): Promise<Buffer | null> {
    return this.repository.config().get('remote', null, 'pushdefault')?.raw ?? null;
  }

  async remoteTrackingBranches(remote: string): Promise<BranchRef[]> {
    return await this.guard(`list tracking branches of '${remote}'`, async () => {
      const branches = await this.listUnder(RefNames.remotePrefix(remote));
      return branches.filter((branch) => branch.name.toString('latin1') !== RefNames.REMOTE_HEAD);
    });
  }

  async remoteTrackingTarget(remote: string, branch: string): Promise<ObjectId | null> {
    return await this.guard(`read ${remote}/${branch}`, () =>
      this.repository.refs().resolve(RefNames.remoteTracking(remote, branch))
    );
  }

  async remoteDefaultBranch(remote: string): Promise<Buffer | null> {
    return await this.guard(`read ${remote}/HEAD`, async () => {
      const target = await this.repository.refs().readSymbolic(RefNames.remoteHead(remote));
      return target ? RefNames.stripPrefix(target, RefNames.remotePrefix(remote)) : null;
    });
  }

  async isAncestor(ancestor: ObjectId, descendant: ObjectId): Promise<boolean> {
    return await this.guard(`compare ${ancestor} and ${descendant}`, () =>
      this.graph.isAncestor(ancestor, descendant)
    );
  }

  async updateRef(branch: string, to: ObjectId, expected: ObjectId): Promise<void> {
    await this.guard(`update branch '${branch}'`, () =>
      this.repository.refs().updateRef(RefNames.branch(branch), to, expected)
    );
  }

  async updateWorkingTree(from: ObjectId, to: ObjectId): Promise<void> {
    if (!this.repository.workingDirectory()) return;
    await this.guard('update working tree', async () => {
      await new WorkingDirectoryManager(this.repository).update(from, to);
    });
  }

  async deleteRef(branch: string, expected: ObjectId): Promise<void> {
    await this.guard(`delete branch '${branch}'`, async () => {
      const current = await this.currentBranch();
      if (current?.equals(Buffer.from(branch))) {
        throw new RefException(`cannot delete branch '${branch}': it is checked out`);
      }
      await this.repository.refs().deleteRef(RefNames.branch(branch), expected);
    });
  }

  async checkout(branch: string): Promise<void> {
    await this.guard(`switch to '${branch}'`, async () => {
      const refs = this.repository.refs();
      const target = await refs.resolve(RefNames.branch(branch));
      if (!target) {
        throw new RefException(`invalid reference: ${branch}`);
      }

      const head = await refs.resolve(RefNames.HEAD);
      if (this.repository.workingDirectory() && head !== target) {
        await new WorkingDirectoryManager(this.repository).update(head, target);
      }
      await refs.setSymbolicRef(RefNames.HEAD, RefNames.branch(branch));
    });
  }

  async close(): Promise<void> {
    await this.repository.close();
  }

  private async listUnder(prefix: string): Promise<BranchRef[]> {
    const records = await this.repository.refs().listRefs(prefix);
    const branches: BranchRef[] = [];
    for (const record of records) {
      const name = RefNames.stripPrefix(record.name, prefix);
      if (name) branches.push({ name, target: record.target });
    }
    return branches;
  }

  /**
   * Errors that are not already GitExceptions surface as RepositoryException
   */
  private async guard<T>(action: string, body: () => Promise<T>): Promise<T> {
    try {
      return await body();
    } catch (error) {
      if (error instanceof GitException) throw error;
      throw new RepositoryException(`cannot ${action}`, error);
    }
  }
}
