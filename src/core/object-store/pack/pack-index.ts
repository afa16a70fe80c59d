import { ObjectException } from '@/core/exceptions';

/**
 * Version 2 pack index (`objects/pack/pack-*.idx`).
 *
 * | Field                | Size          |
 * |----------------------|---------------|
 * | Magic `\377tOc`      | 4 bytes       |
 * | Version (2)          | 4 bytes       |
 * | Fanout table         | 256 * 4 bytes |
 * | Object ids (sorted)  | N * 20 bytes  |
 * | CRC32 checksums      | N * 4 bytes   |
 * | 4-byte offsets       | N * 4 bytes   |
 * | 8-byte large offsets | M * 8 bytes   |
 * | Pack + index sums    | 40 bytes      |
 *
 * An offset with its MSB set is an index into the large offset table.
 */
export class PackIndex {
  static readonly MAGIC = 0xff744f63;
  static readonly VERSION = 2;
  private static readonly HEADER_SIZE = 8;
  private static readonly FANOUT_SIZE = 256 * 4;
  private static readonly SHA_SIZE = 20;
  private static readonly LARGE_OFFSET_FLAG = 0x80000000;

  private sortedOffsets: number[] | null = null;

  private constructor(
    private readonly data: Buffer,
    readonly objectCount: number
  ) {}

  static parse(data: Buffer): PackIndex {
    if (data.length < PackIndex.HEADER_SIZE + PackIndex.FANOUT_SIZE) {
      throw new ObjectException('Pack index too short');
    }
    if (data.readUInt32BE(0) !== PackIndex.MAGIC) {
      throw new ObjectException('Unsupported pack index: version 1 or corrupt signature');
    }
    const version = data.readUInt32BE(4);
    if (version !== PackIndex.VERSION) {
      throw new ObjectException(`Unsupported pack index version: ${version}`);
    }

    const objectCount = data.readUInt32BE(PackIndex.HEADER_SIZE + 255 * 4);
    const minimumSize = PackIndex.HEADER_SIZE + PackIndex.FANOUT_SIZE + objectCount * 28 + 40;
    if (data.length < minimumSize) {
      throw new ObjectException('Pack index truncated');
    }
    return new PackIndex(data, objectCount);
  }

  /**
   * Pack offset of `sha`, or null when the pack does not hold it.
   */
  find(sha: string): number | null {
    const target = Buffer.from(sha, 'hex');
    if (target.length !== PackIndex.SHA_SIZE) return null;

    const first = target[0] ?? 0;
    let low = first === 0 ? 0 : this.fanout(first - 1);
    let high = this.fanout(first);

    while (low < high) {
      const mid = (low + high) >>> 1;
      const cmp = Buffer.compare(this.shaAt(mid), target);
      if (cmp === 0) return this.offsetAt(mid);
      if (cmp < 0) low = mid + 1;
      else high = mid;
    }
    return null;
  }

  objectIds(): string[] {
    const ids: string[] = [];
    for (let i = 0; i < this.objectCount; i++) {
      ids.push(this.shaAt(i).toString('hex'));
    }
    return ids;
  }

  /**
   * Offset where the entry following `offset` starts, or `packEnd` for the last entry.
   */
  nextOffset(offset: number, packEnd: number): number {
    const offsets = this.offsets();
    let low = 0;
    let high = offsets.length;
    while (low < high) {
      const mid = (low + high) >>> 1;
      if ((offsets[mid] ?? 0) <= offset) low = mid + 1;
      else high = mid;
    }
    return offsets[low] ?? packEnd;
  }

  private offsets(): number[] {
    if (!this.sortedOffsets) {
      const offsets: number[] = [];
      for (let i = 0; i < this.objectCount; i++) offsets.push(this.offsetAt(i));
      this.sortedOffsets = offsets.sort((a, b) => a - b);
    }
    return this.sortedOffsets;
  }

  private fanout(index: number): number {
    return this.data.readUInt32BE(PackIndex.HEADER_SIZE + index * 4);
  }

  private shaAt(index: number): Buffer {
    const start = PackIndex.HEADER_SIZE + PackIndex.FANOUT_SIZE + index * PackIndex.SHA_SIZE;
    return this.data.subarray(start, start + PackIndex.SHA_SIZE);
  }

  private offsetAt(index: number): number {
    const offsetTable =
      PackIndex.HEADER_SIZE + PackIndex.FANOUT_SIZE + this.objectCount * (PackIndex.SHA_SIZE + 4);
    const small = this.data.readUInt32BE(offsetTable + index * 4);
    if ((small & PackIndex.LARGE_OFFSET_FLAG) === 0) return small;

    const largeTable = offsetTable + this.objectCount * 4;
    const largeIndex = small & 0x7fffffff;
    return Number(this.data.readBigUInt64BE(largeTable + largeIndex * 8));
  }
}
