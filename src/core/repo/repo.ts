import type { Path } from 'path-scurry';
import type { GitObject } from '@/core/objects';
import type { ObjectStore } from '@/core/object-store';
import type { RefManager } from '@/core/refs';
import type { GitConfigManager } from '@/core/config';

/**
 * Abstract base class for Git repositories
 *
 * A repository is opened once, used, and closed: `close()` releases the
 * file handles held by its object store.
 */
export abstract class Repository {
  /**
   * Get the working directory path, or null for a bare repository
   */
  abstract workingDirectory(): Path | null;

  /**
   * Get the .git directory path
   */
  abstract gitDirectory(): Path;

  abstract objectStore(): ObjectStore;

  abstract refs(): RefManager;

  abstract config(): GitConfigManager;

  /**
   * Read an object from the repository
   */
  abstract readObject(sha: string): Promise<GitObject | null>;

  /**
   * Write an object to the repository
   */
  abstract writeObject(object: GitObject): Promise<string>;

  abstract close(): Promise<void>;
}
