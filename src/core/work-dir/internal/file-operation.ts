import { ObjectReader, Repository } from '@/core/repo';
import { BlobObject, EntryType } from '@/core/objects';
import { FileUtils, logger } from '@/utils';
import path from 'path';
import fs from 'fs-extra';
import type { Stats } from 'fs';
import type { FileOperation, TreeFileInfo } from './types';

/**
 * FileOperationService handles individual file system operations inside the
 * working directory: writing blobs with their mode, deleting files, hashing
 * what is currently on disk.
 */
export class FileOperationService {
  constructor(
    private repository: Repository,
    private workingDirectory: string
  ) {}

  async applyOperation(operation: FileOperation): Promise<void> {
    const absolutePath = this.resolve(operation.path);

    switch (operation.action) {
      case 'create':
      case 'modify':
        await this.writeFromTree(absolutePath, operation.target);
        break;

      case 'delete':
        await this.deleteFile(absolutePath);
        break;
    }
  }

  /**
   * Object id the file at `relativePath` would have as a blob, or null when
   * nothing is there. Symbolic links hash their target, as Git stores them.
   */
  public async hashWorkingFile(relativePath: string): Promise<string | null> {
    const absolutePath = this.resolve(relativePath);
    const stats = await this.lstat(absolutePath);
    if (!stats || stats.isDirectory()) return null;

    const content = stats.isSymbolicLink()
      ? Buffer.from(await fs.readlink(absolutePath, { encoding: 'buffer' }))
      : await fs.readFile(absolutePath);
    return BlobObject.fromContent(content).sha();
  }

  /**
   * lstat of a working tree path, or null when it does not exist
   */
  public async getFileStats(relativePath: string): Promise<Stats | null> {
    return await this.lstat(this.resolve(relativePath));
  }

  private resolve(relativePath: string): string {
    return path.join(this.workingDirectory, ...relativePath.split('/'));
  }

  private async lstat(absolutePath: string): Promise<Stats | null> {
    try {
      return await fs.lstat(absolutePath);
    } catch (error) {
      if (FileUtils.isNotFound(error)) return null;
      throw error;
    }
  }

  /**
   * Remove empty directories from `dirPath` up to the working directory
   */
  private async cleanEmptyDirectories(dirPath: string): Promise<void> {
    let current = dirPath;
    while (current.startsWith(this.workingDirectory + path.sep)) {
      try {
        const entries = await fs.readdir(current);
        if (entries.length > 0) return;
        await fs.rmdir(current);
      } catch (error) {
        if (FileUtils.isNotFound(error)) return;
        throw error;
      }
      current = path.dirname(current);
    }
  }

  private async writeFromTree(filePath: string, target: TreeFileInfo): Promise<void> {
    if (target.mode === EntryType.SUBMODULE) {
      // Submodule contents are not checked out; Git leaves an empty directory
      await FileUtils.createDirectories(filePath);
      return;
    }

    const blob = await ObjectReader.readBlob(this.repository, target.sha);
    const content = blob.content();

    await FileUtils.createDirectories(path.dirname(filePath));
    const existing = await this.lstat(filePath);
    if (existing && !existing.isDirectory()) {
      await fs.unlink(filePath);
    }

    if (target.mode === EntryType.SYMBOLIC_LINK) {
      await this.createSymlink(filePath, content);
      return;
    }

    const fileMode = target.mode === EntryType.EXECUTABLE_FILE ? 0o755 : 0o644;
    await fs.writeFile(filePath, content, { mode: fileMode });
    await fs.chmod(filePath, fileMode);
  }

  private async createSymlink(linkPath: string, targetBuffer: Uint8Array): Promise<void> {
    const target = Buffer.from(targetBuffer);

    try {
      await fs.symlink(target.toString('utf8'), linkPath);
    } catch (error) {
      logger.warn(`failed to create symlink ${linkPath}, writing a plain file:`, error);
      await fs.writeFile(linkPath, target);
    }
  }

  private async deleteFile(filePath: string): Promise<void> {
    const stats = await this.lstat(filePath);
    if (!stats) return;

    if (stats.isDirectory()) {
      // A submodule checkout; only an empty placeholder is removed
      await this.cleanEmptyDirectories(filePath);
      return;
    }

    await fs.unlink(filePath);
    await this.cleanEmptyDirectories(path.dirname(filePath));
  }
}
