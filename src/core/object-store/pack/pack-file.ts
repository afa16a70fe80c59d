import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { ObjectException } from '@/core/exceptions';
import { ObjectTypeHelper } from '@/core/objects';
import { CompressionUtils } from '@/utils/helpers/compress';
import type { RawObject } from '../store';
import { Delta } from './delta';
import { PackIndex } from './pack-index';

/**
 * Resolves a REF_DELTA base that may live outside this pack.
 */
export type BaseResolver = (sha: string) => Promise<RawObject | null>;

interface EntryHeader {
  typeCode: number;
  size: number;
  dataStart: number;
  baseOffset?: number;
  baseSha?: string;
}

/**
 * A `.pack` file read through its index. Entries are read on demand with
 * positioned reads; the file handle stays open until `close()`.
 *
 * Entry header: type in bits 4-6 of the first byte, size as a little-endian
 * varint starting with its low 4 bits. OFS_DELTA (6) is followed by a
 * negative offset to its base, REF_DELTA (7) by the base object id.
 */
export class PackFile {
  private static readonly OFS_DELTA = 6;
  private static readonly REF_DELTA = 7;
  private static readonly TRAILER_SIZE = 20;
  private static readonly MAX_HEADER_SIZE = 32;
  private static readonly CACHE_LIMIT = 256;

  private readonly cache = new Map<number, RawObject>();

  private constructor(
    readonly packPath: string,
    private readonly index: PackIndex,
    private readonly handle: FileHandle,
    private readonly packEnd: number
  ) {}

  static async open(packPath: string, indexPath: string): Promise<PackFile> {
    const index = PackIndex.parse(await fs.readFile(indexPath));
    const handle = await fs.open(packPath, 'r');
    try {
      const { size } = await handle.stat();
      const signature = await PackFile.readAt(handle, 0, 8);
      if (signature.toString('latin1', 0, 4) !== 'PACK') {
        throw new ObjectException(`Invalid pack signature in ${packPath}`);
      }
      return new PackFile(packPath, index, handle, size - PackFile.TRAILER_SIZE);
    } catch (error) {
      await handle.close();
      throw error;
    }
  }

  has(sha: string): boolean {
    return this.index.find(sha) !== null;
  }

  async read(sha: string, resolveBase: BaseResolver): Promise<RawObject | null> {
    const offset = this.index.find(sha);
    if (offset === null) return null;
    return await this.readAtOffset(offset, resolveBase);
  }

  async close(): Promise<void> {
    this.cache.clear();
    await this.handle.close();
  }

  private async readAtOffset(offset: number, resolveBase: BaseResolver): Promise<RawObject> {
    const cached = this.cache.get(offset);
    if (cached) return cached;

    const header = await this.readEntryHeader(offset);
    const end = this.index.nextOffset(offset, this.packEnd);
    const compressed = await PackFile.readAt(this.handle, header.dataStart, end - header.dataStart);
    const data = CompressionUtils.inflateEntry(compressed, header.size);

    let object: RawObject;
    if (header.baseOffset !== undefined) {
      const base = await this.readAtOffset(header.baseOffset, resolveBase);
      object = { type: base.type, content: Delta.apply(base.content, data) };
    } else if (header.baseSha !== undefined) {
      const base = await resolveBase(header.baseSha);
      if (!base) {
        throw new ObjectException(`Missing delta base ${header.baseSha} in ${this.packPath}`);
      }
      object = { type: base.type, content: Delta.apply(base.content, data) };
    } else {
      const type = ObjectTypeHelper.fromPackCode(header.typeCode);
      if (!type) {
        throw new ObjectException(`Unknown pack entry type ${header.typeCode} at ${offset}`);
      }
      object = { type, content: data };
    }

    this.remember(offset, object);
    return object;
  }

  private async readEntryHeader(offset: number): Promise<EntryHeader> {
    const bytes = await PackFile.readAt(this.handle, offset, PackFile.MAX_HEADER_SIZE);
    let position = 0;
    const next = (): number => {
      const byte = bytes[position++];
      if (byte === undefined) throw new ObjectException(`Truncated pack entry at ${offset}`);
      return byte;
    };

    let byte = next();
    const typeCode = (byte >> 4) & 0x07;
    let size = byte & 0x0f;
    let multiplier = 16;
    while (byte & 0x80) {
      byte = next();
      size += (byte & 0x7f) * multiplier;
      multiplier *= 128;
    }

    if (typeCode === PackFile.OFS_DELTA) {
      byte = next();
      let distance = byte & 0x7f;
      while (byte & 0x80) {
        byte = next();
        distance = (distance + 1) * 128 + (byte & 0x7f);
      }
      return { typeCode, size, dataStart: offset + position, baseOffset: offset - distance };
    }

    if (typeCode === PackFile.REF_DELTA) {
      const baseSha = bytes.subarray(position, position + 20).toString('hex');
      if (baseSha.length !== 40) throw new ObjectException(`Truncated pack entry at ${offset}`);
      return { typeCode, size, dataStart: offset + position + 20, baseSha };
    }

    return { typeCode, size, dataStart: offset + position };
  }

  private remember(offset: number, object: RawObject): void {
    if (this.cache.size >= PackFile.CACHE_LIMIT) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) this.cache.delete(oldest.value);
    }
    this.cache.set(offset, object);
  }

  private static async readAt(
    handle: FileHandle,
    position: number,
    length: number
  ): Promise<Buffer> {
    const buffer = Buffer.alloc(Math.max(length, 0));
    const { bytesRead } = await handle.read(buffer, 0, buffer.length, position);
    return buffer.subarray(0, bytesRead);
  }
}

