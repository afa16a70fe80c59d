import { ObjectException } from '@/core/exceptions';

/**
 * Git delta instruction stream, as stored in OFS_DELTA and REF_DELTA pack entries.
 *
 * Layout: source size (varint), target size (varint), then instructions:
 * ┌──────────────────────────────────────────────────────────────┐
 * │ 1xxxxxxx  copy: bits 0-3 select offset bytes, 4-6 size bytes │
 * │ 0nnnnnnn  insert: the next n literal bytes (n > 0)           │
 * └──────────────────────────────────────────────────────────────┘
 * A copy size of 0 stands for 0x10000.
 */
export class Delta {
  private static readonly COPY_INSTRUCTION = 0x80;

  private constructor() {}

  static apply(base: Uint8Array, delta: Uint8Array): Uint8Array {
    const source = Delta.readSize(delta, 0);
    if (source.size !== base.length) {
      throw new ObjectException(
        `Delta source size mismatch: expected ${source.size}, got ${base.length}`
      );
    }

    const target = Delta.readSize(delta, source.nextOffset);
    const result = new Uint8Array(target.size);
    let offset = target.nextOffset;
    let written = 0;

    const next = (): number => {
      const byte = delta[offset++];
      if (byte === undefined) throw new ObjectException('Truncated delta instruction');
      return byte;
    };

    while (offset < delta.length) {
      const cmd = next();

      if (cmd & Delta.COPY_INSTRUCTION) {
        let copyOffset = 0;
        let copySize = 0;
        if (cmd & 0x01) copyOffset += next();
        if (cmd & 0x02) copyOffset += next() * 0x100;
        if (cmd & 0x04) copyOffset += next() * 0x10000;
        if (cmd & 0x08) copyOffset += next() * 0x1000000;
        if (cmd & 0x10) copySize += next();
        if (cmd & 0x20) copySize += next() * 0x100;
        if (cmd & 0x40) copySize += next() * 0x10000;
        if (copySize === 0) copySize = 0x10000;

        if (copyOffset + copySize > base.length || written + copySize > result.length) {
          throw new ObjectException(
            `Copy instruction out of bounds: offset=${copyOffset}, size=${copySize}`
          );
        }
        result.set(base.subarray(copyOffset, copyOffset + copySize), written);
        written += copySize;
      } else if (cmd !== 0) {
        if (offset + cmd > delta.length || written + cmd > result.length) {
          throw new ObjectException(`Insert instruction out of bounds: size=${cmd}`);
        }
        result.set(delta.subarray(offset, offset + cmd), written);
        offset += cmd;
        written += cmd;
      } else {
        throw new ObjectException('Invalid delta instruction: 0x00');
      }
    }

    if (written !== target.size) {
      throw new ObjectException(`Delta result size mismatch: expected ${target.size}, got ${written}`);
    }
    return result;
  }

  /**
   * Little-endian base-128 size with a continuation bit.
   */
  static readSize(data: Uint8Array, start: number): { size: number; nextOffset: number } {
    let size = 0;
    let multiplier = 1;
    let offset = start;
    for (;;) {
      const byte = data[offset++];
      if (byte === undefined) throw new ObjectException('Truncated delta header');
      size += (byte & 0x7f) * multiplier;
      multiplier *= 0x80;
      if ((byte & 0x80) === 0) break;
    }
    return { size, nextOffset: offset };
  }
}
