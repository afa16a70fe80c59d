import { Delta } from '../../core/object-store';

const bytes = (...parts: Array<number | string>): Uint8Array =>
  Buffer.concat(parts.map((part) => (typeof part === 'number' ? Buffer.from([part]) : Buffer.from(part))));

describe('Delta', () => {
  test('reads little-endian base-128 sizes', () => {
    expect(Delta.readSize(bytes(0x91, 0x01), 0)).toEqual({ size: 145, nextOffset: 2 });
    expect(Delta.readSize(bytes(0x05), 0)).toEqual({ size: 5, nextOffset: 1 });
  });

  test('copies from the base and inserts literal bytes', () => {
    const base = Buffer.from('hello world\n');
    const delta = bytes(12, 12, 0x90, 6, 6, 'there\n');

    expect(Buffer.from(Delta.apply(base, delta)).toString()).toBe('hello there\n');
  });

  test('copies from an offset', () => {
    const base = Buffer.from('abcdefgh');
    const delta = bytes(8, 3, 0x91, 2, 3);

    expect(Buffer.from(Delta.apply(base, delta)).toString()).toBe('cde');
  });

  test('rejects a base of the wrong size', () => {
    expect(() => Delta.apply(Buffer.from('abcde'), bytes(8, 1, 0x01, 'x'))).toThrow(
      'Delta source size mismatch: expected 8, got 5'
    );
  });

  test('rejects copies past the end of the base', () => {
    expect(() => Delta.apply(Buffer.from('abcdefgh'), bytes(8, 5, 0x91, 6, 5))).toThrow(
      'Copy instruction out of bounds: offset=6, size=5'
    );
  });

  test('rejects the reserved zero instruction', () => {
    expect(() => Delta.apply(Buffer.from('ab'), bytes(2, 0, 0x00))).toThrow(
      'Invalid delta instruction: 0x00'
    );
  });

  test('rejects output shorter than announced', () => {
    expect(() => Delta.apply(Buffer.from('ab'), bytes(2, 4, 0x01, 'x'))).toThrow(
      'Delta result size mismatch: expected 4, got 1'
    );
  });
});
