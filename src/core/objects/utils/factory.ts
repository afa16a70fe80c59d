import { GitObject, ObjectType } from '../base';
import { BlobObject } from '../blob/blob-object';
import { CommitObject } from '../commit/commit-object';
import { TagObject } from '../tag/tag-object';
import { TreeObject } from '../tree/tree-object';

/**
 * Builds the object class matching `type` from its raw content.
 */
export const parseObject = (type: ObjectType, content: Uint8Array): GitObject => {
  switch (type) {
    case ObjectType.BLOB:
      return BlobObject.fromContent(content);
    case ObjectType.TREE:
      return TreeObject.fromContent(content);
    case ObjectType.COMMIT:
      return CommitObject.fromContent(content);
    case ObjectType.TAG:
      return TagObject.fromContent(content);
  }
};
