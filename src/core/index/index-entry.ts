import { ObjectException } from '../exceptions';
import type { Stats } from 'fs';
import { HashUtils } from '@/utils';
import { GitFileMode, GitTimestamp, IndexEntryFlags, IndexEntryLayout } from './index-entry-utils';

type FileStats = Pick<Stats, 'ctimeMs' | 'mtimeMs' | 'dev' | 'ino' | 'mode' | 'uid' | 'gid' | 'size'>;

/**
 * Represents a single file entry in the Git index (staging area).
 *
 * Binary Layout (62 bytes + filename + padding):
 * ┌────────────────────────────────────────────────────┐
 * │ ctime seconds    (4 bytes) │ ctime nanosecs (4)    │
 * │ mtime seconds    (4 bytes) │ mtime nanosecs (4)    │
 * │ device ID        (4 bytes) │ inode         (4)     │
 * │ mode             (4 bytes) │ uid           (4)     │
 * │ gid              (4 bytes) │ file size     (4)     │
 * │ SHA-1 hash      (20 bytes)                         │
 * │ flags            (2 bytes)                         │
 * │ filename (variable) + null terminator + padding    │
 * └────────────────────────────────────────────────────┘
 */
export class IndexEntry {
  public creationTime: GitTimestamp;
  public modificationTime: GitTimestamp;

  public deviceId: number;
  public inodeNumber: number;
  public fileMode: number;
  public userId: number;
  public groupId: number;
  public fileSize: number;

  public contentHash: string;

  public assumeValid: boolean;
  public stageNumber: number; // 0 = normal, 1-3 = merge conflict

  // Relative to the repository root, '/'-separated
  public filePath: string;

  constructor(data: Partial<IndexEntry> = {}) {
    this.creationTime = data.creationTime ?? GitTimestamp.ZERO;
    this.modificationTime = data.modificationTime ?? GitTimestamp.ZERO;
    this.deviceId = data.deviceId ?? 0;
    this.inodeNumber = data.inodeNumber ?? 0;
    this.fileMode = data.fileMode ?? GitFileMode.DEFAULT_FILE_MODE;
    this.userId = data.userId ?? 0;
    this.groupId = data.groupId ?? 0;
    this.fileSize = data.fileSize ?? 0;
    this.contentHash = data.contentHash ?? '';
    this.assumeValid = data.assumeValid ?? false;
    this.stageNumber = data.stageNumber ?? 0;
    this.filePath = data.filePath ?? '';
  }

  get isSymlink(): boolean {
    return GitFileMode.isSymbolicLink(this.fileMode);
  }

  get isGitlink(): boolean {
    return GitFileMode.isGitlink(this.fileMode);
  }

  /**
   * Index entries sort by the bytes of their path, then by stage
   */
  compareTo(other: IndexEntry): number {
    const byPath = Buffer.compare(Buffer.from(this.filePath), Buffer.from(other.filePath));
    return byPath !== 0 ? byPath : this.stageNumber - other.stageNumber;
  }

  serialize(): Uint8Array {
    const filenameBytes = Buffer.from(this.filePath, 'utf8');

    const entrySize = IndexEntryLayout.FIXED_HEADER_SIZE + filenameBytes.length + 1;
    const paddedSize =
      Math.ceil(entrySize / IndexEntryLayout.ALIGNMENT_BOUNDARY) *
      IndexEntryLayout.ALIGNMENT_BOUNDARY;

    const buffer = new Uint8Array(paddedSize);
    const dataView = new DataView(buffer.buffer);

    this.writeFixedHeaderFields(dataView, filenameBytes.length);
    buffer.set(HashUtils.hexToBytes(this.contentHash), IndexEntryLayout.SHA_OFFSET);
    buffer.set(filenameBytes, IndexEntryLayout.FIXED_HEADER_SIZE);

    return buffer;
  }

  private writeFixedHeaderFields(dataView: DataView, filenameLength: number): void {
    // Values wider than 32 bits are truncated, as Git does
    const u32 = (value: number): number => value % 0x1_0000_0000;

    dataView.setUint32(IndexEntryLayout.CTIME_SECONDS_OFFSET, u32(this.creationTime.seconds));
    dataView.setUint32(IndexEntryLayout.CTIME_NANOSECONDS_OFFSET, this.creationTime.nanoseconds);
    dataView.setUint32(IndexEntryLayout.MTIME_SECONDS_OFFSET, u32(this.modificationTime.seconds));
    dataView.setUint32(
      IndexEntryLayout.MTIME_NANOSECONDS_OFFSET,
      this.modificationTime.nanoseconds
    );

    dataView.setUint32(IndexEntryLayout.DEVICE_ID_OFFSET, u32(this.deviceId));
    dataView.setUint32(IndexEntryLayout.INODE_OFFSET, u32(this.inodeNumber));
    dataView.setUint32(IndexEntryLayout.MODE_OFFSET, this.fileMode);
    dataView.setUint32(IndexEntryLayout.USER_ID_OFFSET, u32(this.userId));
    dataView.setUint32(IndexEntryLayout.GROUP_ID_OFFSET, u32(this.groupId));
    dataView.setUint32(IndexEntryLayout.FILE_SIZE_OFFSET, u32(this.fileSize));

    const flags = IndexEntryFlags.encode(this.assumeValid, this.stageNumber, filenameLength);
    dataView.setUint16(IndexEntryLayout.FLAGS_OFFSET, flags);
  }

  static deserialize(data: Uint8Array, offset: number): { entry: IndexEntry; nextOffset: number } {
    if (offset + IndexEntryLayout.FIXED_HEADER_SIZE > data.length) {
      throw new ObjectException('Invalid index entry: truncated header');
    }
    const dataView = new DataView(data.buffer, data.byteOffset + offset);
    const entry = new IndexEntry();

    entry.readFixedHeaderFields(data, dataView, offset);

    const filenameStart = offset + IndexEntryLayout.FIXED_HEADER_SIZE;
    const terminator = data.indexOf(0, filenameStart);
    if (terminator === -1) {
      throw new ObjectException('Invalid index entry: filename not null-terminated');
    }
    entry.filePath = Buffer.from(data.subarray(filenameStart, terminator)).toString('utf8');

    const entrySize = terminator + 1 - offset;
    const nextOffset =
      offset +
      Math.ceil(entrySize / IndexEntryLayout.ALIGNMENT_BOUNDARY) *
        IndexEntryLayout.ALIGNMENT_BOUNDARY;

    return { entry, nextOffset };
  }

  private readFixedHeaderFields(data: Uint8Array, dataView: DataView, offset: number): void {
    this.creationTime = new GitTimestamp(
      dataView.getUint32(IndexEntryLayout.CTIME_SECONDS_OFFSET),
      dataView.getUint32(IndexEntryLayout.CTIME_NANOSECONDS_OFFSET)
    );
    this.modificationTime = new GitTimestamp(
      dataView.getUint32(IndexEntryLayout.MTIME_SECONDS_OFFSET),
      dataView.getUint32(IndexEntryLayout.MTIME_NANOSECONDS_OFFSET)
    );

    this.deviceId = dataView.getUint32(IndexEntryLayout.DEVICE_ID_OFFSET);
    this.inodeNumber = dataView.getUint32(IndexEntryLayout.INODE_OFFSET);
    this.fileMode = dataView.getUint32(IndexEntryLayout.MODE_OFFSET);
    this.userId = dataView.getUint32(IndexEntryLayout.USER_ID_OFFSET);
    this.groupId = dataView.getUint32(IndexEntryLayout.GROUP_ID_OFFSET);
    this.fileSize = dataView.getUint32(IndexEntryLayout.FILE_SIZE_OFFSET);

    const shaStart = offset + IndexEntryLayout.SHA_OFFSET;
    this.contentHash = HashUtils.bytesToHex(
      data.subarray(shaStart, shaStart + IndexEntryLayout.SHA_BYTE_LENGTH)
    );

    const { assumeValid, stage } = IndexEntryFlags.decode(
      dataView.getUint16(IndexEntryLayout.FLAGS_OFFSET)
    );
    this.assumeValid = assumeValid;
    this.stageNumber = stage;
  }

  /**
   * Create an index entry from file stats
   */
  public static fromFileStats(path: string, stats: FileStats, sha: string): IndexEntry {
    return new IndexEntry({
      filePath: path,
      creationTime: GitTimestamp.fromMilliseconds(stats.ctimeMs),
      modificationTime: GitTimestamp.fromMilliseconds(stats.mtimeMs),
      deviceId: stats.dev,
      inodeNumber: stats.ino,
      fileMode: GitFileMode.fromStats(stats.mode),
      userId: stats.uid,
      groupId: stats.gid,
      fileSize: stats.size,
      contentHash: sha,
    });
  }
}
