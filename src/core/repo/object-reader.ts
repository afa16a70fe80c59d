import { Repository } from './repo';
import { RepositoryException } from './exceptions';
import {
  BlobObject,
  CommitObject,
  TreeObject,
  TagObject,
  GitObject,
  ObjectValidator,
} from '@/core/objects';

export class ObjectReader {
  /**
   * Read a commit object, or fail if the id names something else
   */
  public static async readCommit(repository: Repository, commitSha: string): Promise<CommitObject> {
    const obj = await ObjectReader.readExisting(repository, commitSha);
    if (!ObjectValidator.isCommit(obj)) {
      throw new RepositoryException(`object ${commitSha} is a ${obj.type()}, not a commit`);
    }
    return obj;
  }

  public static async readTree(repository: Repository, treeSha: string): Promise<TreeObject> {
    const obj = await ObjectReader.readExisting(repository, treeSha);
    if (!ObjectValidator.isTree(obj)) {
      throw new RepositoryException(`object ${treeSha} is a ${obj.type()}, not a tree`);
    }
    return obj;
  }

  public static async readBlob(repository: Repository, blobSha: string): Promise<BlobObject> {
    const obj = await ObjectReader.readExisting(repository, blobSha);
    if (!ObjectValidator.isBlob(obj)) {
      throw new RepositoryException(`object ${blobSha} is a ${obj.type()}, not a blob`);
    }
    return obj;
  }

  /**
   * Peel annotated tags until a commit is reached
   */
  public static async peelToCommit(repository: Repository, sha: string): Promise<CommitObject> {
    let current = sha;
    for (let depth = 0; depth < 10; depth++) {
      const obj = await ObjectReader.readExisting(repository, current);
      if (ObjectValidator.isCommit(obj)) return obj;
      if (!ObjectValidator.isTag(obj)) {
        throw new RepositoryException(`object ${sha} does not point to a commit`);
      }
      current = obj.objectSha;
    }
    throw new RepositoryException(`tag chain too deep at ${sha}`);
  }

  private static async readExisting(repository: Repository, sha: string): Promise<GitObject> {
    const obj = await repository.readObject(sha);
    if (!obj) {
      throw new RepositoryException(`object not found: ${sha}`);
    }
    return obj;
  }
}
