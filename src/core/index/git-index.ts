import { IndexEntry } from './index-entry';
import { FileUtils } from '@/utils';
import { createHash } from 'crypto';
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { IndexLockedException, ObjectException } from '../exceptions';

/**
 * The Git index (staging area), stored as a binary file at .git/index.
 *
 * Index File Format:
 * ┌────────────────────────────────────────┐
 * │ Header (12 bytes)                      │
 * │   Signature: "DIRC" (4 bytes)          │
 * │   Version: 2 or 3 (4 bytes)            │
 * │   Entry Count: N (4 bytes)             │
 * ├────────────────────────────────────────┤
 * │ Entries (variable length)              │
 * ├────────────────────────────────────────┤
 * │ Extensions (optional, skipped)         │
 * ├────────────────────────────────────────┤
 * │ SHA-1 Checksum (20 bytes)              │
 * └────────────────────────────────────────┘
 *
 * Extensions are cache data Git rebuilds on demand, so they are dropped when
 * the index is rewritten.
 */
export class GitIndex {
  public static readonly FILE_NAME = 'index';

  private static readonly SIGNATURE = 'DIRC';
  private static readonly VERSION = 2;
  private static readonly READABLE_VERSIONS = [2, 3];
  private static readonly HEADER_SIZE = 12;
  private static readonly CHECKSUM_SIZE = 20;

  public entries: IndexEntry[];

  constructor(entries: IndexEntry[] = []) {
    this.entries = entries;
    this.sortEntries();
  }

  /**
   * Read an index file from disk; a missing file is an empty index
   */
  public static async read(indexPath: string): Promise<GitIndex> {
    const data = await FileUtils.readFileIfExists(indexPath);
    return data ? GitIndex.deserialize(new Uint8Array(data)) : new GitIndex();
  }

  /**
   * Write the index through `<path>.lock`, renamed into place once complete
   */
  public async write(indexPath: string): Promise<void> {
    const lockPath = `${indexPath}.lock`;
    let handle: FileHandle;
    try {
      handle = await fs.open(lockPath, 'wx');
    } catch (error) {
      if (FileUtils.errorCode(error) === 'EEXIST') {
        throw new IndexLockedException(lockPath);
      }
      throw error;
    }

    let committed = false;
    try {
      try {
        await handle.writeFile(this.serialize());
      } finally {
        await handle.close();
      }
      await fs.rename(lockPath, indexPath);
      committed = true;
    } finally {
      if (!committed) await fs.rm(lockPath, { force: true });
    }
  }

  public getEntry(path: string): IndexEntry | undefined {
    return this.entries.find((e) => e.filePath === path);
  }

  public entriesFor(path: string): IndexEntry[] {
    return this.entries.filter((e) => e.filePath === path);
  }

  public add(entry: IndexEntry): void {
    this.entries.push(entry);
    this.sortEntries();
  }

  public serialize(): Uint8Array {
    const header = Buffer.alloc(GitIndex.HEADER_SIZE);
    header.write(GitIndex.SIGNATURE, 0, 'ascii');
    header.writeUInt32BE(GitIndex.VERSION, 4);
    header.writeUInt32BE(this.entries.length, 8);

    const content = Buffer.concat([header, ...this.entries.map((entry) => entry.serialize())]);
    const checksum = createHash('sha1').update(content).digest();
    return new Uint8Array(Buffer.concat([content, checksum]));
  }

  public static deserialize(data: Uint8Array): GitIndex {
    if (data.length < GitIndex.HEADER_SIZE + GitIndex.CHECKSUM_SIZE) {
      throw new ObjectException('Invalid index: file too short');
    }

    const view = new DataView(data.buffer, data.byteOffset, data.byteLength);
    const signature = Buffer.from(data.subarray(0, 4)).toString('latin1');
    if (signature !== GitIndex.SIGNATURE) {
      throw new ObjectException(`Invalid index signature: ${signature}`);
    }

    const version = view.getUint32(4);
    if (!GitIndex.READABLE_VERSIONS.includes(version)) {
      throw new ObjectException(`Unsupported index version: ${version}`);
    }

    const contentSize = data.length - GitIndex.CHECKSUM_SIZE;
    const actualChecksum = createHash('sha1').update(data.subarray(0, contentSize)).digest();
    if (!actualChecksum.equals(data.subarray(contentSize))) {
      throw new ObjectException('Index checksum mismatch');
    }

    const entryCount = view.getUint32(8);
    const entries: IndexEntry[] = [];
    let offset = GitIndex.HEADER_SIZE;
    for (let i = 0; i < entryCount; i++) {
      const { entry, nextOffset } = IndexEntry.deserialize(data.subarray(0, contentSize), offset);
      entries.push(entry);
      offset = nextOffset;
    }

    return new GitIndex(entries);
  }

  private sortEntries(): void {
    this.entries.sort((a, b) => a.compareTo(b));
  }
}
