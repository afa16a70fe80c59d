import { BlobObject } from './blob/blob-object';
import { TreeObject } from './tree/tree-object';
import { TreeEntry, EntryType } from './tree/tree-entry';
import { CommitObject, type CommitCreateOptions } from './commit/commit-object';
import { CommitPerson } from './commit/commit-person';
import { TagObject } from './tag/tag-object';
import { GitObject, ObjectType, ObjectTypeHelper } from './base';
import { ObjectValidator } from './utils/validate';
import { parseObject } from './utils/factory';

export {
  BlobObject,
  TreeObject,
  TreeEntry,
  EntryType,
  GitObject,
  ObjectType,
  ObjectTypeHelper,
  CommitObject,
  CommitCreateOptions,
  CommitPerson,
  TagObject,
  ObjectValidator,
  parseObject,
};
