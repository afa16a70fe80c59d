import { Repository, RepositoryException } from '@/core/repo';
import { GitIndex } from '@/core/index';
import { ObjectException, WorkingTreeConflictException } from '@/core/exceptions';
import { logger } from '@/utils';
import path from 'path';
import {
  FileOperationService,
  TreeAnalyzer,
  WorkingDirectoryValidator,
  IndexUpdater,
  type ChangeAnalysis,
  type TreeFileInfo,
} from './internal';

export type UpdateResult = ChangeAnalysis['summary'];

/**
 * WorkingDirectoryManager moves the working directory and index from one
 * commit's snapshot to another's.
 *
 * Only paths that differ between the two commits are touched. The update is
 * refused up front when any of them carries local or staged changes, so a
 * refused update leaves the working directory as it was.
 */
export class WorkingDirectoryManager {
  private fileService: FileOperationService;
  private treeAnalyzer: TreeAnalyzer;
  private validator: WorkingDirectoryValidator;
  private indexUpdater: IndexUpdater;
  private indexPath: string;

  constructor(repository: Repository) {
    const workingDirectory = repository.workingDirectory();
    if (!workingDirectory) {
      throw new RepositoryException('this operation must be run in a work tree');
    }
    this.indexPath = path.join(repository.gitDirectory().fullpath(), GitIndex.FILE_NAME);

    this.fileService = new FileOperationService(repository, workingDirectory.fullpath());
    this.treeAnalyzer = new TreeAnalyzer(repository);
    this.validator = new WorkingDirectoryValidator(this.fileService);
    this.indexUpdater = new IndexUpdater(this.fileService, this.indexPath);
  }

  /**
   * Update from `fromCommit` (null for an unborn branch) to `toCommit`
   */
  public async update(fromCommit: string | null, toCommit: string): Promise<UpdateResult> {
    logger.debug(`updating working directory ${fromCommit ?? '(none)'} -> ${toCommit}`);

    const currentFiles = fromCommit
      ? await this.treeAnalyzer.getCommitFiles(fromCommit)
      : new Map<string, TreeFileInfo>();
    const targetFiles = await this.treeAnalyzer.getCommitFiles(toCommit);
    const { operations, summary } = this.treeAnalyzer.analyzeChanges(currentFiles, targetFiles);

    if (operations.length === 0) {
      return summary;
    }

    const index = await this.readIndex();
    const conflicts = await this.validator.findConflicts(operations, currentFiles, index);
    if (conflicts.length > 0) {
      throw new WorkingTreeConflictException(conflicts);
    }

    for (const operation of operations) {
      await this.fileService.applyOperation(operation);
      logger.debug(`${operation.action} ${operation.path}`);
    }

    await this.indexUpdater.update(index, targetFiles, operations);
    return summary;
  }

  private async readIndex(): Promise<GitIndex | null> {
    try {
      return await GitIndex.read(this.indexPath);
    } catch (error) {
      if (!(error instanceof ObjectException)) throw error;
      logger.warn(`ignoring unreadable index: ${error.message}`);
      return null;
    }
  }
}
