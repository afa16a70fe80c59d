import { GitIndex, IndexEntry } from '@/core/index';
import { EntryType } from '@/core/objects';
import type { FileOperationService } from './file-operation';
import type { FileOperation, TreeFileInfo } from './types';
import { logger } from '@/utils';

const MODES: Record<EntryType, number> = {
  [EntryType.DIRECTORY]: 0o040000,
  [EntryType.REGULAR_FILE]: 0o100644,
  [EntryType.EXECUTABLE_FILE]: 0o100755,
  [EntryType.SYMBOLIC_LINK]: 0o120000,
  [EntryType.SUBMODULE]: 0o160000,
};

/**
 * IndexUpdater rewrites the index after file operations so that it matches
 * the new snapshot.
 */
export class IndexUpdater {
  constructor(
    private fileService: FileOperationService,
    private indexPath: string
  ) {}

  /**
   * Entries for untouched paths keep their stat data; touched paths are
   * re-stat'ed. Without a readable previous index every entry is rebuilt from
   * the target snapshot.
   */
  public async update(
    previous: GitIndex | null,
    targetFiles: Map<string, TreeFileInfo>,
    operations: FileOperation[]
  ): Promise<void> {
    const touched = new Set(operations.map((op) => op.path));
    const entries: IndexEntry[] = [];

    if (previous) {
      entries.push(...previous.entries.filter((entry) => !touched.has(entry.filePath)));
    }

    for (const [filePath, info] of targetFiles) {
      if (previous && !touched.has(filePath)) continue;
      entries.push(await this.createIndexEntry(filePath, info, touched.has(filePath)));
    }

    await new GitIndex(entries).write(this.indexPath);
    logger.debug(`rewrote index with ${entries.length} entries`);
  }

  private async createIndexEntry(
    filePath: string,
    info: TreeFileInfo,
    written: boolean
  ): Promise<IndexEntry> {
    const mode = MODES[info.mode];
    if (written && info.mode !== EntryType.SUBMODULE) {
      const stats = await this.fileService.getFileStats(filePath);
      if (stats) {
        const entry = IndexEntry.fromFileStats(filePath, stats, info.sha);
        entry.fileMode = mode;
        return entry;
      }
    }
    return new IndexEntry({ filePath, fileMode: mode, contentHash: info.sha });
  }
}
