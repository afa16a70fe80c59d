import { GitObject, ObjectType } from '../base';

/**
 * BLOB (Binary Large Object) - Represents the content of a file.
 * Stores the actual file data without any metadata like filename or
 * permissions. Symbolic links are blobs holding the link target.
 *
 * Serialized format:
 * ┌─────────────────────────────────────────────────────┐
 * │ "blob" │ SPACE │ size │ NULL │ content bytes...     │
 * └─────────────────────────────────────────────────────┘
 */
export class BlobObject extends GitObject {
  private readonly _content: Uint8Array;

  constructor(content: Uint8Array = new Uint8Array()) {
    super();
    this._content = content;
  }

  override type(): ObjectType {
    return ObjectType.BLOB;
  }

  override content(): Uint8Array {
    return this._content;
  }

  static fromContent(content: Uint8Array): BlobObject {
    return new BlobObject(content);
  }
}
