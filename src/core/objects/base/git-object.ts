import { ObjectType, ObjectTypeHelper } from './object-type';
import { ObjectException } from '@/core/exceptions';
import { HashUtils } from '@/utils/helpers/hash';

export interface ObjectHeader {
  type: ObjectType;
  contentStartsAt: number;
  contentLength: number;
}

/**
 * Abstract base class for all Git objects (blob, tree, commit, tag).
 *
 * In Git's internal storage system, everything is stored as objects with a specific format:
 * - Header: "<type> <size>\0" (e.g., "blob 12\0")
 * - Content: The actual object data
 *
 * The object id is the SHA-1 of header plus content, so two objects with the same
 * bytes always share an id.
 */
export abstract class GitObject {
  abstract type(): ObjectType;

  /**
   * Raw object content (without header)
   */
  abstract content(): Uint8Array;

  size(): number {
    return this.content().length;
  }

  sha(): string {
    return HashUtils.objectId(this.type(), this.content());
  }

  /**
   * Converts this object into the Git storage format (header + content).
   *
   * For example, a blob containing "Hello World" becomes:
   * "blob 11\0Hello World" (where \0 is a null byte)
   */
  serialize(): Uint8Array {
    const content = this.content();
    const header = new TextEncoder().encode(`${this.type()} ${content.length}\0`);

    const result = new Uint8Array(header.length + content.length);
    result.set(header, 0);
    result.set(content, header.length);
    return result;
  }

  /**
   * Parses and validates the "<type> <size>\0" header of a serialized object.
   */
  static parseHeader(data: Uint8Array): ObjectHeader {
    const nullIndex = data.indexOf(0);
    if (nullIndex === -1) {
      throw new ObjectException('Invalid object: no null terminator found');
    }

    const header = new TextDecoder().decode(data.subarray(0, nullIndex));
    const [typeName, size] = header.split(' ');
    if (!typeName || !size || !/^\d+$/.test(size)) {
      throw new ObjectException(`Invalid object header: ${header}`);
    }

    const contentLength = data.length - nullIndex - 1;
    if (contentLength !== parseInt(size, 10)) {
      throw new ObjectException(`Content size mismatch expected: ${size}, got ${contentLength}`);
    }

    return {
      type: ObjectTypeHelper.fromString(typeName),
      contentStartsAt: nullIndex + 1,
      contentLength,
    };
  }
}
