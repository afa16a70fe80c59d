import { ObjectException } from '@/core/exceptions';
import { GitObject, ObjectType } from '../base';
import { TreeEntry } from './tree-entry';

/**
 * Git Tree Object Implementation
 *
 * A tree object represents a directory snapshot. Its content is the
 * concatenation of its entries, sorted the way Git sorts them:
 * "100644 README.md\0[20 bytes]40000 src\0[20 bytes]"
 */
export class TreeObject extends GitObject {
  private readonly _entries: TreeEntry[];

  constructor(entries: TreeEntry[] = []) {
    super();
    this._entries = [...entries].sort((a, b) => a.compareTo(b));
  }

  override type(): ObjectType {
    return ObjectType.TREE;
  }

  override content(): Uint8Array {
    return Buffer.concat(this._entries.map((entry) => entry.serialize()));
  }

  get entries(): readonly TreeEntry[] {
    return this._entries;
  }

  isEmpty(): boolean {
    return this._entries.length === 0;
  }

  static fromContent(content: Uint8Array): TreeObject {
    const entries: TreeEntry[] = [];
    let offset = 0;

    while (offset < content.length) {
      const { entry, nextOffset } = TreeEntry.deserialize(content, offset);
      entries.push(entry);
      offset = nextOffset;
    }

    if (offset !== content.length) {
      throw new ObjectException('Invalid tree object: invalid entries');
    }
    return new TreeObject(entries);
  }
}
