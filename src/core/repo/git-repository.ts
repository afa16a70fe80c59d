import { PathScurry, type Path } from 'path-scurry';
import fs from 'fs-extra';
import { Repository } from './repo';
import { RepositoryException, RepositoryNotFoundException } from './exceptions';
import { FileObjectStore, type ObjectStore } from '@/core/object-store';
import { RefManager } from '@/core/refs';
import { GitConfigManager, type ConfigLocations } from '@/core/config';
import type { GitObject } from '@/core/objects';
import { FileUtils, logger } from '@/utils';

export interface RepositoryOptions {
  /** `key=value` assignments applied at command-line level. */
  configOverrides?: string[];
  /** Where user and system configuration live; defaults follow Git. */
  configLocations?: Omit<ConfigLocations, 'gitDir'>;
}

/**
 * A repository in Git's on-disk format.
 *
 * ┌─ <working-directory>/
 * │ ├─ .git/ ← Git metadata directory (or a "gitdir: <path>" file)
 * │ │ ├─ objects/ ← loose objects and packs
 * │ │ ├─ refs/ ← heads/, remotes/, tags/
 * │ │ ├─ packed-refs
 * │ │ ├─ HEAD ← Current branch pointer
 * │ │ ├─ index ← staging area
 * │ │ └─ config ← Repository configuration
 * │ └─ ... working files
 *
 * A bare repository is the metadata directory alone and has no working tree.
 */
export class GitRepository extends Repository {
  private static readonly DEFAULT_GIT_DIR = '.git';
  private static readonly GITDIR_FILE_PREFIX = 'gitdir:';

  private readonly _objectStore: ObjectStore;
  private readonly _refs: RefManager;
  private readonly _config: GitConfigManager;

  private constructor(
    private readonly _gitDirectory: Path,
    private readonly _workingDirectory: Path | null,
    options: RepositoryOptions
  ) {
    super();
    const gitDir = _gitDirectory.fullpath();
    this._objectStore = new FileObjectStore(_gitDirectory.resolve('objects').fullpath());
    this._refs = new RefManager(gitDir);
    this._config = new GitConfigManager({ ...options.configLocations, gitDir });
    for (const assignment of options.configOverrides ?? []) {
      this._config.setCommandLine(assignment);
    }
  }

  /**
   * Open the repository rooted at `directory`: a working tree containing
   * `.git`, or a bare repository.
   */
  public static async open(
    directory: string,
    options: RepositoryOptions = {}
  ): Promise<GitRepository> {
    const root = new PathScurry(directory).cwd;
    const located = await GitRepository.locate(root);
    if (!located) {
      throw new RepositoryException(`not a git repository: ${root.fullpath()}`);
    }

    const repository = new GitRepository(located.gitDir, located.workDir, options);
    await repository._config.load();
    logger.debug(`opened repository at ${located.gitDir.fullpath()}`);
    return repository;
  }

  /**
   * Find repository by walking up the directory tree from `startPath`
   */
  public static async findRepository(
    startPath: string,
    options: RepositoryOptions = {}
  ): Promise<GitRepository> {
    let current: Path | undefined = new PathScurry(startPath).cwd;

    while (current) {
      if (await GitRepository.locate(current)) {
        return await GitRepository.open(current.fullpath(), options);
      }
      current = current.parent ?? undefined;
    }

    throw new RepositoryNotFoundException(startPath);
  }

  override workingDirectory(): Path | null {
    return this._workingDirectory;
  }

  override gitDirectory(): Path {
    return this._gitDirectory;
  }

  override objectStore(): ObjectStore {
    return this._objectStore;
  }

  override refs(): RefManager {
    return this._refs;
  }

  override config(): GitConfigManager {
    return this._config;
  }

  override async readObject(sha: string): Promise<GitObject | null> {
    return await this._objectStore.readObject(sha);
  }

  override async writeObject(object: GitObject): Promise<string> {
    return await this._objectStore.writeObject(object);
  }

  override async close(): Promise<void> {
    await this._objectStore.close();
  }

  private static async locate(
    dir: Path
  ): Promise<{ gitDir: Path; workDir: Path | null } | null> {
    const dotGit = dir.resolve(GitRepository.DEFAULT_GIT_DIR);
    const stats = await FileUtils.statIfExists(dotGit.fullpath());

    if (stats?.isDirectory()) {
      return { gitDir: dotGit, workDir: dir };
    }

    if (stats?.isFile()) {
      const content = (await fs.readFile(dotGit.fullpath(), 'utf8')).trim();
      if (!content.startsWith(GitRepository.GITDIR_FILE_PREFIX)) {
        throw new RepositoryException(`invalid gitfile format: ${dotGit.fullpath()}`);
      }
      const target = content.substring(GitRepository.GITDIR_FILE_PREFIX.length).trim();
      return { gitDir: dir.resolve(target), workDir: dir };
    }

    if (await GitRepository.isGitDirectory(dir)) {
      return { gitDir: dir, workDir: null };
    }
    return null;
  }

  private static async isGitDirectory(dir: Path): Promise<boolean> {
    const required = ['HEAD', 'objects', 'refs'];
    const present = await Promise.all(
      required.map((name) => fs.pathExists(dir.resolve(name).fullpath()))
    );
    return present.every(Boolean);
  }
}
