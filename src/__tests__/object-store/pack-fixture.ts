import { createHash } from 'crypto';
import { deflateSync } from 'zlib';

export interface PackedObject {
  /** Id of the object the entry resolves to */
  sha: string;
  encode: (offset: number) => Buffer;
}

const entryHeader = (typeCode: number, size: number): Buffer => {
  const out: number[] = [];
  let byte = (typeCode << 4) | (size & 0x0f);
  let rest = Math.floor(size / 16);
  while (rest > 0) {
    out.push(byte | 0x80);
    byte = rest & 0x7f;
    rest = Math.floor(rest / 128);
  }
  out.push(byte);
  return Buffer.from(out);
};

const offsetDistance = (distance: number): Buffer => {
  let value = distance;
  const out = [value & 0x7f];
  value = Math.floor(value / 128);
  while (value > 0) {
    value -= 1;
    out.unshift(0x80 | (value & 0x7f));
    value = Math.floor(value / 128);
  }
  return Buffer.from(out);
};

export const objectId = (type: string, content: Buffer): string =>
  createHash('sha1').update(`${type} ${content.length}\0`).update(content).digest('hex');

const PACK_CODES: Record<string, number> = { commit: 1, tree: 2, blob: 3, tag: 4 };

export const fullEntry = (type: 'commit' | 'tree' | 'blob' | 'tag', content: Buffer): PackedObject => ({
  sha: objectId(type, content),
  encode: () => Buffer.concat([entryHeader(PACK_CODES[type] ?? 0, content.length), deflateSync(content)]),
});

export const offsetDeltaEntry = (sha: string, baseOffset: number, delta: Buffer): PackedObject => ({
  sha,
  encode: (offset) =>
    Buffer.concat([entryHeader(6, delta.length), offsetDistance(offset - baseOffset), deflateSync(delta)]),
});

export const refDeltaEntry = (sha: string, baseSha: string, delta: Buffer): PackedObject => ({
  sha,
  encode: () => Buffer.concat([entryHeader(7, delta.length), Buffer.from(baseSha, 'hex'), deflateSync(delta)]),
});

/**
 * Lay out a version 2 pack and its index. Entries start at offset 12.
 */
export const buildPack = (objects: PackedObject[]): { pack: Buffer; index: Buffer } => {
  const header = Buffer.alloc(12);
  header.write('PACK', 0, 'latin1');
  header.writeUInt32BE(2, 4);
  header.writeUInt32BE(objects.length, 8);

  const chunks: Buffer[] = [header];
  const records: Array<{ sha: string; offset: number }> = [];
  let offset = header.length;
  for (const object of objects) {
    const encoded = object.encode(offset);
    records.push({ sha: object.sha, offset });
    chunks.push(encoded);
    offset += encoded.length;
  }
  const body = Buffer.concat(chunks);
  const packSum = createHash('sha1').update(body).digest();

  records.sort((a, b) => (a.sha < b.sha ? -1 : a.sha > b.sha ? 1 : 0));
  const indexHeader = Buffer.alloc(8);
  indexHeader.writeUInt32BE(0xff744f63, 0);
  indexHeader.writeUInt32BE(2, 4);
  const fanout = Buffer.alloc(256 * 4);
  for (let byte = 0; byte < 256; byte++) {
    const count = records.filter((record) => parseInt(record.sha.substring(0, 2), 16) <= byte).length;
    fanout.writeUInt32BE(count, byte * 4);
  }
  const offsets = Buffer.alloc(records.length * 4);
  records.forEach((record, i) => offsets.writeUInt32BE(record.offset, i * 4));

  const index = Buffer.concat([
    indexHeader,
    fanout,
    ...records.map((record) => Buffer.from(record.sha, 'hex')),
    Buffer.alloc(records.length * 4),
    offsets,
    packSum,
    Buffer.alloc(20),
  ]);
  return { pack: Buffer.concat([body, packSum]), index };
};
