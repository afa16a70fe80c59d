import path from 'path';
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { RefException, RefLockedException } from '@/core/exceptions';
import { FileUtils, HashUtils } from '@/utils';

export interface PackedRef {
  name: Buffer;
  target: string;
  peeled?: string;
}

/**
 * The `packed-refs` file: one "<sha> <refname>" line per reference, optionally
 * followed by a "^<sha>" line holding the peeled target of an annotated tag.
 *
 * ```
 * # pack-refs with: peeled fully-peeled sorted
 * 3f1c...9a refs/heads/main
 * 8d0e...12 refs/tags/v1.0
 * ^a41b...77
 * ```
 *
 * Names stay raw bytes: nothing guarantees they are valid text.
 */
export class PackedRefs {
  public static readonly FILE_NAME = 'packed-refs' as const;
  private static readonly NEWLINE = 0x0a;

  private constructor() {}

  static parse(data: Buffer): PackedRef[] {
    const refs: PackedRef[] = [];
    for (const line of PackedRefs.lines(data)) {
      if (line.length === 0 || line[0] === 0x23) continue;

      if (line[0] === 0x5e) {
        const last = refs[refs.length - 1];
        if (last) last.peeled = line.subarray(1, 41).toString('latin1');
        continue;
      }

      const target = line.subarray(0, 40).toString('latin1');
      if (line[40] !== 0x20 || !HashUtils.isObjectId(target)) continue;
      refs.push({ name: Buffer.from(line.subarray(41)), target });
    }
    return refs;
  }

  static async read(gitDir: string): Promise<PackedRef[]> {
    const data = await FileUtils.readFileIfExists(path.join(gitDir, PackedRefs.FILE_NAME));
    return data ? PackedRefs.parse(data) : [];
  }

  static async find(gitDir: string, name: Buffer): Promise<PackedRef | null> {
    const refs = await PackedRefs.read(gitDir);
    return refs.find((ref) => ref.name.equals(name)) ?? null;
  }

  /**
   * Rewrites `packed-refs` without `name` (and its peeled line) under
   * `packed-refs.lock`. Returns false when the ref was not packed.
   */
  static async remove(gitDir: string, name: Buffer): Promise<boolean> {
    const filePath = path.join(gitDir, PackedRefs.FILE_NAME);
    const data = await FileUtils.readFileIfExists(filePath);
    if (!data) return false;

    const kept: Buffer[] = [];
    let removed = false;
    let skipPeeled = false;
    for (const line of PackedRefs.lines(data)) {
      if (skipPeeled && line[0] === 0x5e) continue;
      skipPeeled = false;
      if (line[0] !== 0x23 && line[0] !== 0x5e && line.subarray(41).equals(name)) {
        removed = true;
        skipPeeled = true;
        continue;
      }
      if (line.length > 0) kept.push(line);
    }
    if (!removed) return false;

    const lockPath = `${filePath}.lock`;
    let handle: FileHandle;
    try {
      handle = await fs.open(lockPath, 'wx');
    } catch (error) {
      if (FileUtils.errorCode(error) === 'EEXIST') {
        throw new RefLockedException(PackedRefs.FILE_NAME, lockPath);
      }
      throw new RefException(`cannot lock ${PackedRefs.FILE_NAME}`, error);
    }

    try {
      try {
        await handle.writeFile(Buffer.concat(kept.flatMap((line) => [line, Buffer.from('\n')])));
      } finally {
        await handle.close();
      }
      await fs.rename(lockPath, filePath);
    } catch (error) {
      await fs.rm(lockPath, { force: true });
      throw new RefException(`failed to rewrite ${PackedRefs.FILE_NAME}`, error);
    }
    return true;
  }

  private static lines(data: Buffer): Buffer[] {
    const lines: Buffer[] = [];
    let start = 0;
    while (start < data.length) {
      let end = data.indexOf(PackedRefs.NEWLINE, start);
      if (end === -1) end = data.length;
      let line = data.subarray(start, end);
      if (line[line.length - 1] === 0x0d) line = line.subarray(0, line.length - 1);
      lines.push(line);
      start = end + 1;
    }
    return lines;
  }
}
