import { ObjectException } from '../exceptions';

/**
 * Git Index Entry Binary Layout Constants
 *
 * Git stores each index entry in a specific binary format for efficiency.
 * Understanding this layout is crucial for serialization/deserialization.
 */
export class IndexEntryLayout {
  static readonly CTIME_SECONDS_OFFSET = 0;
  static readonly CTIME_NANOSECONDS_OFFSET = 4;
  static readonly MTIME_SECONDS_OFFSET = 8;
  static readonly MTIME_NANOSECONDS_OFFSET = 12;
  static readonly DEVICE_ID_OFFSET = 16;
  static readonly INODE_OFFSET = 20;
  static readonly MODE_OFFSET = 24;
  static readonly USER_ID_OFFSET = 28;
  static readonly GROUP_ID_OFFSET = 32;
  static readonly FILE_SIZE_OFFSET = 36;
  static readonly SHA_OFFSET = 40;
  static readonly FLAGS_OFFSET = 60;

  // Size constants
  static readonly FIXED_HEADER_SIZE = 62; // Everything before filename
  static readonly SHA_BYTE_LENGTH = 20; // SHA-1 is always 20 bytes
  static readonly ALIGNMENT_BOUNDARY = 8; // Entries are padded to 8-byte boundaries
}

/**
 * Git stores file type and permissions in a single 32-bit mode field.
 * The upper 4 bits indicate the file type, lower bits contain permissions.
 */
export class GitFileMode {
  static readonly TYPE_MASK = 0b1111;
  static readonly TYPE_SHIFT = 12;

  static readonly REGULAR_FILE_TYPE = 0b1000;
  static readonly SYMBOLIC_LINK_TYPE = 0b1010;
  static readonly GITLINK_TYPE = 0b1110;

  static readonly EXECUTABLE_MASK = 0o111;

  static readonly DEFAULT_FILE_MODE = 0o100644;
  static readonly EXECUTABLE_FILE_MODE = 0o100755;

  static getFileType(mode: number): number {
    return (mode >> this.TYPE_SHIFT) & this.TYPE_MASK;
  }

  static isSymbolicLink(mode: number): boolean {
    return this.getFileType(mode) === this.SYMBOLIC_LINK_TYPE;
  }

  static isGitlink(mode: number): boolean {
    return this.getFileType(mode) === this.GITLINK_TYPE;
  }

  /**
   * Normalise a file system mode to one of the modes Git records
   */
  static fromStats(mode: number): number {
    if (this.getFileType(mode) === this.SYMBOLIC_LINK_TYPE) return 0o120000;
    return (mode & this.EXECUTABLE_MASK) !== 0 ? this.EXECUTABLE_FILE_MODE : this.DEFAULT_FILE_MODE;
  }
}

/**
 * Git Index Entry Flags Utilities
 *
 * The flags field contains several pieces of information packed into 16 bits:
 * - Bit 15: assume-valid flag
 * - Bit 14: extended flag (must be 0 for version 2)
 * - Bits 13-12: stage number (0-3, for merge conflicts)
 * - Bits 11-0: filename length (max 4095)
 */
export class IndexEntryFlags {
  static readonly ASSUME_VALID_MASK = 0x8000;
  static readonly EXTENDED_MASK = 0x4000;

  static readonly STAGE_SHIFT = 12;
  static readonly STAGE_MASK = 0x3000;

  static readonly FILENAME_LENGTH_MASK = 0x0fff;
  static readonly MAX_FILENAME_LENGTH = 0x0fff;

  /**
   * Encode flags from individual components
   */
  static encode(assumeValid: boolean, stage: number, filenameLength: number): number {
    let flags = 0;

    if (assumeValid) {
      flags |= this.ASSUME_VALID_MASK;
    }

    flags |= (stage & 0x3) << this.STAGE_SHIFT;

    const cappedLength = Math.min(filenameLength, this.MAX_FILENAME_LENGTH);
    flags |= cappedLength;

    return flags;
  }

  /**
   * Decode flags into individual components
   */
  static decode(flags: number): { assumeValid: boolean; stage: number; filenameLength: number } {
    const assumeValid = (flags & this.ASSUME_VALID_MASK) !== 0;
    const stage = (flags & this.STAGE_MASK) >> this.STAGE_SHIFT;
    const filenameLength = flags & this.FILENAME_LENGTH_MASK;

    if (flags & this.EXTENDED_MASK) {
      throw new ObjectException('extended index entry flags are not supported');
    }

    return { assumeValid, stage, filenameLength };
  }
}

/**
 * Git stores timestamps as [seconds_since_epoch, nanoseconds] pairs
 */
export class GitTimestamp {
  readonly seconds: number;
  readonly nanoseconds: number;

  constructor(seconds: number, nanoseconds: number) {
    this.seconds = seconds;
    this.nanoseconds = nanoseconds;
  }

  /**
   * Create a GitTimestamp from JavaScript milliseconds
   */
  static fromMilliseconds(milliseconds: number): GitTimestamp {
    const seconds = Math.floor(milliseconds / 1000);
    const nanoseconds = Math.floor((milliseconds - seconds * 1000) * 1_000_000);
    return new GitTimestamp(seconds, nanoseconds);
  }

  static readonly ZERO = new GitTimestamp(0, 0);
}
