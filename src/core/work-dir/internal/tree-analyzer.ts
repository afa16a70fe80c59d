import { ObjectReader, Repository } from '@/core/repo';
import type { ChangeAnalysis, FileOperation, TreeFileInfo } from './types';
import { PathUtils } from '@/utils';

/**
 * TreeAnalyzer flattens trees and works out the file operations that turn
 * one snapshot into another.
 */
export class TreeAnalyzer {
  constructor(private repository: Repository) {}

  /**
   * Every non-directory path of a commit's tree
   */
  public async getCommitFiles(commitSha: string): Promise<Map<string, TreeFileInfo>> {
    const commit = await ObjectReader.readCommit(this.repository, commitSha);
    return await this.getTreeFiles(commit.treeSha);
  }

  /**
   * Get all files from a tree recursively, keyed by '/'-separated path
   */
  public async getTreeFiles(
    treeSha: string,
    basePath: string = ''
  ): Promise<Map<string, TreeFileInfo>> {
    const files = new Map<string, TreeFileInfo>();

    const tree = await ObjectReader.readTree(this.repository, treeSha);

    for (const entry of tree.entries) {
      const fullPath = PathUtils.normalizePath(basePath, entry.name);

      if (entry.isDirectory()) {
        const subFiles = await this.getTreeFiles(entry.sha, fullPath);
        subFiles.forEach((info, path) => files.set(path, info));
        continue;
      }

      files.set(fullPath, { sha: entry.sha, mode: entry.mode });
    }

    return files;
  }

  /**
   * Operations needed to transform current state to target state, deletions first
   */
  public analyzeChanges(
    currentFiles: Map<string, TreeFileInfo>,
    targetFiles: Map<string, TreeFileInfo>
  ): ChangeAnalysis {
    const operations: FileOperation[] = [];
    const summary = { created: 0, modified: 0, deleted: 0 };

    for (const filePath of currentFiles.keys()) {
      if (!targetFiles.has(filePath)) {
        operations.push({ action: 'delete', path: filePath });
        summary.deleted++;
      }
    }

    for (const [filePath, target] of targetFiles) {
      const current = currentFiles.get(filePath);

      if (!current) {
        operations.push({ action: 'create', path: filePath, target });
        summary.created++;
      } else if (this.hasChanged(current, target)) {
        operations.push({ action: 'modify', path: filePath, target });
        summary.modified++;
      }
    }

    return { operations, summary };
  }

  private hasChanged(current: TreeFileInfo, target: TreeFileInfo): boolean {
    return current.sha !== target.sha || current.mode !== target.mode;
  }
}
