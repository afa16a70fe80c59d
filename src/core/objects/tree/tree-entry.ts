import { ObjectException } from '@/core/exceptions';
import { HashUtils } from '@/utils/helpers/hash';

export enum EntryType {
  DIRECTORY = '040000',
  REGULAR_FILE = '100644',
  EXECUTABLE_FILE = '100755',
  SYMBOLIC_LINK = '120000',
  SUBMODULE = '160000',
}

/**
 * Represents a single entry in a Git tree object.
 *
 * Entry types by mode:
 * - 040000: Directory (tree object), written as "40000" inside tree objects
 * - 100644: Regular file (blob object)
 * - 100755: Executable file (blob object)
 * - 120000: Symbolic link (blob object)
 * - 160000: Git submodule (commit object)
 *
 * Serialized format in tree object:
 * [mode] [space] [filename] [null byte] [20-byte SHA-1 binary]
 */
export class TreeEntry {
  private static readonly NULL_BYTE = 0x00;
  private static readonly SPACE_BYTE = 0x20;
  private static readonly SHA_LENGTH_BYTES = 20;

  readonly mode: EntryType;
  readonly name: string;
  readonly sha: string;

  constructor(mode: string, name: string, sha: string) {
    this.mode = TreeEntry.fromMode(mode);
    this.name = TreeEntry.validateName(name);
    if (!HashUtils.isObjectId(sha)) {
      throw new ObjectException(`Invalid object id for tree entry '${name}': ${sha}`);
    }
    this.sha = sha;
  }

  /**
   * Older tools wrote group-writable files as 100664; they are regular files.
   */
  static fromMode(mode: string): EntryType {
    const normalized = mode.padStart(6, '0');
    if (normalized === '100664') return EntryType.REGULAR_FILE;
    const entryType = Object.values(EntryType).find((type) => type === normalized);
    if (!entryType) {
      throw new ObjectException(`Unknown mode: ${mode}`);
    }
    return entryType;
  }

  isDirectory(): boolean {
    return this.mode === EntryType.DIRECTORY;
  }

  isFile(): boolean {
    return this.mode === EntryType.REGULAR_FILE || this.mode === EntryType.EXECUTABLE_FILE;
  }

  isExecutable(): boolean {
    return this.mode === EntryType.EXECUTABLE_FILE;
  }

  isSymbolicLink(): boolean {
    return this.mode === EntryType.SYMBOLIC_LINK;
  }

  isSubmodule(): boolean {
    return this.mode === EntryType.SUBMODULE;
  }

  serialize(): Uint8Array {
    const mode = this.isDirectory() ? '40000' : this.mode;
    const modeAndName = Buffer.from(`${mode} ${this.name}\0`, 'utf8');
    return Buffer.concat([modeAndName, Buffer.from(this.sha, 'hex')]);
  }

  /**
   * Git sorts entries by name, with directories compared as if they had a trailing '/'.
   */
  compareTo(other: TreeEntry): number {
    const thisKey = Buffer.from(this.isDirectory() ? this.name + '/' : this.name);
    const otherKey = Buffer.from(other.isDirectory() ? other.name + '/' : other.name);
    return Buffer.compare(thisKey, otherKey);
  }

  static deserialize(data: Uint8Array, offset: number): { entry: TreeEntry; nextOffset: number } {
    const spaceIndex = data.indexOf(TreeEntry.SPACE_BYTE, offset);
    const nullIndex = spaceIndex === -1 ? -1 : data.indexOf(TreeEntry.NULL_BYTE, spaceIndex + 1);
    const shaEnd = nullIndex + 1 + TreeEntry.SHA_LENGTH_BYTES;
    if (spaceIndex === -1 || nullIndex === -1 || shaEnd > data.length) {
      throw new ObjectException('Invalid tree object: truncated entry');
    }

    const decoder = new TextDecoder();
    const mode = decoder.decode(data.subarray(offset, spaceIndex));
    const name = decoder.decode(data.subarray(spaceIndex + 1, nullIndex));
    const sha = HashUtils.bytesToHex(data.subarray(nullIndex + 1, shaEnd));

    return { entry: new TreeEntry(mode, name, sha), nextOffset: shaEnd };
  }

  private static validateName(name: string): string {
    if (name.length === 0 || name.includes('/') || name.includes('\0')) {
      throw new ObjectException(`Invalid tree entry name: ${JSON.stringify(name)}`);
    }
    return name;
  }
}
