import { createHash } from 'crypto';

export class HashUtils {
  /**
   * SHA-1 of the given bytes as a lowercase hexadecimal string.
   */
  static sha1Hex(data: Uint8Array): string {
    return createHash('sha1').update(data).digest('hex');
  }

  /**
   * Object id of a loose object: the hash of "<type> <size>\0" followed by the content.
   */
  static objectId(type: string, content: Uint8Array): string {
    return createHash('sha1')
      .update(`${type} ${content.length}\0`)
      .update(content)
      .digest('hex');
  }

  static bytesToHex(bytes: Uint8Array): string {
    return Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength).toString('hex');
  }

  static hexToBytes(hex: string): Uint8Array {
    return new Uint8Array(Buffer.from(hex, 'hex'));
  }

  static isObjectId(value: string): boolean {
    return /^[0-9a-f]{40}$/.test(value);
  }
}
