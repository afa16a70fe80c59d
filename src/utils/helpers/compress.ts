import { constants, deflate, inflate, inflateSync } from 'zlib';
import { promisify } from 'util';

const deflateAsync = promisify(deflate);
const inflateAsync = promisify(inflate);

/**
 * zlib helpers for loose objects and pack entries.
 */
export class CompressionUtils {
  static async compress(data: Uint8Array): Promise<Uint8Array> {
    const compressed = await deflateAsync(Buffer.from(data));
    return new Uint8Array(compressed);
  }

  static async decompress(compressedData: Uint8Array): Promise<Uint8Array> {
    const decompressed = await inflateAsync(Buffer.from(compressedData));
    return new Uint8Array(decompressed);
  }

  /**
   * Inflates a pack entry whose compressed stream may be followed by unrelated bytes.
   * `expectedSize` is the inflated size recorded in the entry header.
   */
  static inflateEntry(compressedData: Uint8Array, expectedSize: number): Uint8Array {
    const inflated = inflateSync(compressedData, { finishFlush: constants.Z_SYNC_FLUSH });
    const length = Math.min(inflated.length, expectedSize);
    return new Uint8Array(inflated.buffer, inflated.byteOffset, length);
  }
}
