import type { GitIndex } from '@/core/index';
import { EntryType } from '@/core/objects';
import type { FileOperationService } from './file-operation';
import type { FileOperation, TreeFileInfo } from './types';

/**
 * WorkingDirectoryValidator finds paths whose local state would be lost by
 * a set of file operations.
 *
 * A path is safe when its staged entry still matches the old snapshot and the
 * file on disk holds either the old or the new content. Paths the operations
 * do not touch are never inspected.
 */
export class WorkingDirectoryValidator {
  constructor(private fileService: FileOperationService) {}

  public async findConflicts(
    operations: FileOperation[],
    currentFiles: Map<string, TreeFileInfo>,
    index: GitIndex | null
  ): Promise<string[]> {
    const conflicts: string[] = [];

    for (const operation of operations) {
      const current = currentFiles.get(operation.path);
      const target = operation.action === 'delete' ? undefined : operation.target;

      if (index && !this.isIndexClean(index, operation.path, current, target)) {
        conflicts.push(operation.path);
        continue;
      }

      if (!(await this.isWorkingFileClean(operation.path, current, target))) {
        conflicts.push(operation.path);
      }
    }

    return conflicts;
  }

  private isIndexClean(
    index: GitIndex,
    filePath: string,
    current: TreeFileInfo | undefined,
    target: TreeFileInfo | undefined
  ): boolean {
    const entries = index.entriesFor(filePath);
    if (entries.length === 0) return true;

    const [entry] = entries;
    if (entries.length > 1 || !entry || entry.stageNumber !== 0) return false;

    return entry.contentHash === current?.sha || entry.contentHash === target?.sha;
  }

  private async isWorkingFileClean(
    filePath: string,
    current: TreeFileInfo | undefined,
    target: TreeFileInfo | undefined
  ): Promise<boolean> {
    const isSubmodule = (info: TreeFileInfo | undefined) => info?.mode === EntryType.SUBMODULE;
    if (isSubmodule(current) || isSubmodule(target)) return true;

    const onDisk = await this.fileService.hashWorkingFile(filePath);
    if (onDisk === null) return true;

    return onDisk === current?.sha || onDisk === target?.sha;
  }
}
