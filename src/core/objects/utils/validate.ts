import { GitObject, ObjectType } from '../base';
import { CommitObject } from '../commit/commit-object';
import { BlobObject } from '../blob/blob-object';
import { TreeObject } from '../tree/tree-object';
import { TagObject } from '../tag/tag-object';

/**
 * Narrows a Git object to its concrete class.
 */
export class ObjectValidator {
  private constructor() {}

  public static isCommit(object: GitObject | null): object is CommitObject {
    return object instanceof CommitObject;
  }

  public static isTree(object: GitObject | null): object is TreeObject {
    return object instanceof TreeObject;
  }

  public static isBlob(object: GitObject | null): object is BlobObject {
    return object instanceof BlobObject;
  }

  public static isTag(object: GitObject | null): object is TagObject {
    return object?.type() === ObjectType.TAG && object instanceof TagObject;
  }
}
