import type { GitObject, ObjectType } from '../objects';

/**
 * An object as stored: its type and its content without the header.
 */
export interface RawObject {
  type: ObjectType;
  content: Uint8Array;
}

export interface ObjectStore {
  /**
   * Write an object to storage
   *
   * @return The SHA-1 hash of the stored object
   */
  writeObject(object: GitObject): Promise<string>;

  writeRawObject(object: RawObject): Promise<string>;

  /**
   * Read and parse an object, or null when it is not stored
   */
  readObject(sha: string): Promise<GitObject | null>;

  readRawObject(sha: string): Promise<RawObject | null>;

  hasObject(sha: string): Promise<boolean>;

  /**
   * Release open pack files
   */
  close(): Promise<void>;
}
