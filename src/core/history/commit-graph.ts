import { Repository, ObjectReader } from '@/core/repo';
import { Queue } from '@/utils';

/**
 * Walks commit parents to answer reachability questions.
 */
export class CommitGraph {
  private readonly parents = new Map<string, readonly string[]>();

  constructor(private readonly repository: Repository) {}

  /**
   * True when `ancestor` is reachable from `descendant` by following parent
   * links, including the case where both are the same commit.
   */
  public async isAncestor(ancestor: string, descendant: string): Promise<boolean> {
    if (ancestor === descendant) return true;

    const visited = new Set<string>([descendant]);
    const pending = new Queue<string>([descendant]);

    for (let current = pending.shift(); current !== undefined; current = pending.shift()) {
      for (const parent of await this.parentsOf(current)) {
        if (parent === ancestor) return true;
        if (!visited.has(parent)) {
          visited.add(parent);
          pending.push(parent);
        }
      }
    }
    return false;
  }

  private async parentsOf(sha: string): Promise<readonly string[]> {
    const cached = this.parents.get(sha);
    if (cached) return cached;

    const commit = await ObjectReader.readCommit(this.repository, sha);
    this.parents.set(sha, commit.parentShas);
    return commit.parentShas;
  }
}
