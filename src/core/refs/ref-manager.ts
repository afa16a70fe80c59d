import path from 'path';
import { promises as fs } from 'fs';
import type { FileHandle } from 'fs/promises';
import { RefConflictException, RefException, RefLockedException } from '@/core/exceptions';
import { FileUtils, HashUtils, logger } from '@/utils';
import { PackedRefs } from './packed-refs';

/**
 * Content of a single reference: either an object id or a pointer to another ref.
 */
export type RefValue = { kind: 'direct'; sha: string } | { kind: 'symbolic'; target: Buffer };

export interface RefRecord {
  /** Full reference name, e.g. `refs/heads/main`, as stored on disk. */
  name: Buffer;
  target: string;
}

/**
 * RefManager reads and writes Git references: loose files under `refs/`,
 * the `packed-refs` file, and symbolic refs such as HEAD.
 *
 * File Structure:
 * .git/
 * ├── HEAD                    # "ref: refs/heads/main" or a detached SHA
 * ├── packed-refs             # refs packed by gc
 * └── refs/
 *     ├── heads/main          # SHA of main's tip
 *     └── remotes/origin/
 *         ├── HEAD            # "ref: refs/remotes/origin/main"
 *         └── main
 *
 * A loose ref shadows a packed one with the same name. Writes go through
 * `<ref>.lock`, created exclusively, and verify the value the caller expects
 * before renaming the lock into place.
 */
export class RefManager {
  public static readonly REFS_DIRNAME = 'refs' as const;
  public static readonly SYMBOLIC_REF_PREFIX = 'ref: ' as const;
  public static readonly HEAD_FILE = 'HEAD' as const;
  private static readonly LOCK_SUFFIX = '.lock';
  private static readonly MAX_SYMREF_DEPTH = 5;

  constructor(private readonly gitDir: string) {}

  /**
   * Read a reference without following symbolic refs.
   */
  public async read(refName: string | Buffer): Promise<RefValue | null> {
    const name = Buffer.from(refName);
    const content = await FileUtils.readFileIfExists(this.refPath(name));
    if (content) return RefManager.parseValue(content, name);

    const packed = await PackedRefs.find(this.gitDir, name);
    return packed ? { kind: 'direct', sha: packed.target } : null;
  }

  /**
   * Resolve a reference to an object id, following symbolic refs.
   */
  public async resolve(refName: string | Buffer): Promise<string | null> {
    let current: string | Buffer = refName;
    for (let depth = 0; depth < RefManager.MAX_SYMREF_DEPTH; depth++) {
      const value = await this.read(current);
      if (!value) return null;
      if (value.kind === 'direct') return value.sha;
      current = value.target;
    }
    throw new RefException(`Reference depth exceeded for ${refName.toString()}`);
  }

  /**
   * Target of a symbolic ref, or null when `refName` is missing or direct.
   */
  public async readSymbolic(refName: string): Promise<Buffer | null> {
    const value = await this.read(refName);
    return value?.kind === 'symbolic' ? value.target : null;
  }

  /**
   * All direct refs whose name starts with `prefix` (which must end in '/'),
   * loose and packed, sorted by name.
   */
  public async listRefs(prefix: string): Promise<RefRecord[]> {
    const records = new Map<string, RefRecord>();

    for (const packed of await PackedRefs.read(this.gitDir)) {
      if (packed.name.subarray(0, prefix.length).equals(Buffer.from(prefix))) {
        records.set(packed.name.toString('hex'), { name: packed.name, target: packed.target });
      }
    }

    for (const loose of await this.listLoose(Buffer.from(prefix))) {
      records.set(loose.name.toString('hex'), loose);
    }

    return [...records.values()].sort((a, b) => Buffer.compare(a.name, b.name));
  }

  /**
   * Point `refName` at `newSha`. `expected` is the value the ref must hold
   * beforehand: an object id, or null for "must not exist". Leave it undefined
   * to skip the check.
   */
  public async updateRef(
    refName: string | Buffer,
    newSha: string,
    expected?: string | null
  ): Promise<void> {
    if (!HashUtils.isObjectId(newSha)) {
      throw new RefException(`cannot update ref '${refName}': invalid object id ${newSha}`);
    }
    await this.withLock(refName, async (handle) => {
      await this.verifyExpected(refName, expected);
      await handle.writeFile(`${newSha}\n`);
    });
    logger.debug(`updated ${refName} to ${newSha}`);
  }

  public async setSymbolicRef(refName: string | Buffer, target: string | Buffer): Promise<void> {
    await this.withLock(refName, async (handle) => {
      await handle.writeFile(
        Buffer.concat([
          Buffer.from(RefManager.SYMBOLIC_REF_PREFIX),
          Buffer.from(target),
          Buffer.from('\n'),
        ])
      );
    });
    logger.debug(`pointed ${refName} at ${target}`);
  }

  /**
   * Delete a reference from both loose and packed storage.
   */
  public async deleteRef(refName: string | Buffer, expected?: string): Promise<void> {
    const refPath = this.refPath(Buffer.from(refName));
    await this.withLock(
      refName,
      async () => {
        await this.verifyExpected(refName, expected);
        await fs.rm(refPath, { force: true });
        await PackedRefs.remove(this.gitDir, Buffer.from(refName));
      },
      false
    );
    await this.pruneEmptyDirectories(RefManager.parentOf(refPath));
    logger.debug(`deleted ${refName}`);
  }

  private async verifyExpected(refName: string | Buffer, expected: string | null | undefined) {
    if (expected === undefined) return;

    const current = await this.read(refName);
    const actual = current?.kind === 'direct' ? current.sha : null;
    if (current?.kind === 'symbolic' || actual !== expected) {
      throw new RefConflictException(refName.toString(), expected, actual);
    }
  }

  /**
   * Run `body` while holding `<ref>.lock`. With `commit`, the lock file becomes
   * the new ref; otherwise it is removed afterwards.
   */
  private async withLock(
    refName: string | Buffer,
    body: (handle: FileHandle) => Promise<void>,
    commit: boolean = true
  ): Promise<void> {
    const refPath = this.refPath(Buffer.from(refName));
    const lockPath = Buffer.concat([refPath, Buffer.from(RefManager.LOCK_SUFFIX)]);

    let handle: FileHandle;
    try {
      await fs.mkdir(RefManager.parentOf(refPath), { recursive: true });
      handle = await fs.open(lockPath, 'wx');
    } catch (error) {
      if (FileUtils.errorCode(error) === 'EEXIST') {
        throw new RefLockedException(refName.toString(), lockPath.toString());
      }
      throw new RefException(`cannot lock ref '${refName}'`, error);
    }

    let committed = false;
    try {
      try {
        await body(handle);
      } finally {
        await handle.close();
      }
      if (commit) {
        await fs.rename(lockPath, refPath);
        committed = true;
      }
    } catch (error) {
      if (error instanceof RefException) throw error;
      throw new RefException(`cannot update ref '${refName}'`, error);
    } finally {
      if (!committed) await fs.rm(lockPath, { force: true });
    }
  }

  private async listLoose(prefix: Buffer): Promise<RefRecord[]> {
    const records: RefRecord[] = [];
    const base = prefix[prefix.length - 1] === 0x2f ? prefix.subarray(0, -1) : prefix;

    const walk = async (dirName: Buffer): Promise<void> => {
      let children: Buffer[];
      try {
        children = await fs.readdir(this.refPath(dirName), { encoding: 'buffer' });
      } catch (error) {
        if (FileUtils.isNotFound(error)) return;
        throw new RefException(`cannot list ${dirName.toString()}`, error);
      }

      for (const child of children) {
        const name = Buffer.concat([dirName, Buffer.from('/'), child]);
        if (name.toString('latin1').endsWith(RefManager.LOCK_SUFFIX)) continue;

        const stats = await fs.stat(this.refPath(name));
        if (stats.isDirectory()) {
          await walk(name);
          continue;
        }

        const content = await fs.readFile(this.refPath(name));
        const value = RefManager.parseValue(content, name);
        if (value.kind === 'direct') records.push({ name, target: value.sha });
      }
    };

    await walk(base);
    return records;
  }

  private async pruneEmptyDirectories(dir: Buffer): Promise<void> {
    const stop = Buffer.from(path.join(this.gitDir, RefManager.REFS_DIRNAME));
    let current = dir;
    while (current.length > stop.length && current.subarray(0, stop.length).equals(stop)) {
      try {
        await fs.rmdir(current);
      } catch (error) {
        const code = FileUtils.errorCode(error);
        if (code === 'ENOTEMPTY' || code === 'EEXIST' || code === 'ENOENT') return;
        throw new RefException(`cannot remove ${current.toString()}`, error);
      }
      current = RefManager.parentOf(current);
    }
  }

  private static parentOf(filePath: Buffer): Buffer {
    const slash = filePath.lastIndexOf(path.sep);
    return slash <= 0 ? filePath.subarray(0, 1) : filePath.subarray(0, slash);
  }

  private refPath(name: Buffer): Buffer {
    return Buffer.concat([Buffer.from(this.gitDir + path.sep), name]);
  }

  private static isTrailingSpace(byte: number | undefined): boolean {
    return byte === 0x0a || byte === 0x0d || byte === 0x20 || byte === 0x09;
  }

  private static parseValue(content: Buffer, name: Buffer): RefValue {
    const text = content.toString('latin1').trim();
    if (text.startsWith(RefManager.SYMBOLIC_REF_PREFIX)) {
      const target = content.subarray(RefManager.SYMBOLIC_REF_PREFIX.length);
      let end = target.length;
      while (end > 0 && RefManager.isTrailingSpace(target[end - 1])) end--;
      return { kind: 'symbolic', target: Buffer.from(target.subarray(0, end)) };
    }
    if (!HashUtils.isObjectId(text)) {
      throw new RefException(`invalid ref content in ${name.toString()}: ${text}`);
    }
    return { kind: 'direct', sha: text };
  }
}
