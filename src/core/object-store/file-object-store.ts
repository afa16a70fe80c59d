import path from 'path';
import { promises as fs } from 'fs';
import { glob } from 'glob';
import type { ObjectStore, RawObject } from './store';
import { ObjectException } from '../exceptions';
import { CompressionUtils, FileUtils, HashUtils, logger } from '@/utils';
import { GitObject, parseObject } from '../objects';
import { PackFile } from './pack/pack-file';

/**
 * File-based Git object database: loose objects plus pack files.
 *
 * Directory Structure:
 * ┌─ .git/objects/
 * │ ├─ ab/ ← First 2 characters of SHA
 * │ │ └─ cdef123... ← Remaining 38 characters of SHA (zlib-compressed)
 * │ ├─ pack/
 * │ │ ├─ pack-<hash>.idx
 * │ │ └─ pack-<hash>.pack
 * │ └─ ...
 *
 * New objects are always written loose. Pack files are discovered lazily and
 * rescanned when a lookup misses, since a fetch may add packs while the store is open.
 */
export class FileObjectStore implements ObjectStore {
  private packs: Map<string, PackFile> | null = null;

  constructor(private readonly objectsPath: string) {}

  public async writeObject(object: GitObject): Promise<string> {
    return await this.writeRawObject({ type: object.type(), content: object.content() });
  }

  /**
   * Writes the object unless it is already stored. The file is written under a
   * temporary name and renamed into place.
   */
  public async writeRawObject(object: RawObject): Promise<string> {
    const sha = HashUtils.objectId(object.type, object.content);
    if (await this.hasObject(sha)) return sha;

    const filePath = this.resolveObjectPath(sha);
    const header = Buffer.from(`${object.type} ${object.content.length}\0`);
    const compressed = await CompressionUtils.compress(Buffer.concat([header, object.content]));

    try {
      await FileUtils.createDirectories(path.dirname(filePath));
      const tempPath = `${filePath}.${process.pid}.tmp`;
      await fs.writeFile(tempPath, compressed, { mode: 0o444 });
      await fs.rename(tempPath, filePath);
    } catch (error) {
      throw new ObjectException(`Failed to write object ${sha}`, error);
    }
    return sha;
  }

  public async readObject(sha: string): Promise<GitObject | null> {
    const raw = await this.readRawObject(sha);
    if (!raw) return null;
    try {
      return parseObject(raw.type, raw.content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ObjectException(`Failed to parse object ${sha}: ${reason}`, error);
    }
  }

  public async readRawObject(sha: string): Promise<RawObject | null> {
    if (!HashUtils.isObjectId(sha)) return null;

    const loose = await this.readLoose(sha);
    if (loose) return loose;

    const packed = await this.readPacked(sha, false);
    if (packed) return packed;

    return await this.readPacked(sha, true);
  }

  public async hasObject(sha: string): Promise<boolean> {
    if (!HashUtils.isObjectId(sha)) return false;
    if (await FileUtils.exists(this.resolveObjectPath(sha))) return true;

    for (const pack of (await this.loadPacks(false)).values()) {
      if (pack.has(sha)) return true;
    }
    for (const pack of (await this.loadPacks(true)).values()) {
      if (pack.has(sha)) return true;
    }
    return false;
  }

  public async close(): Promise<void> {
    const packs = this.packs;
    this.packs = null;
    if (!packs) return;
    await Promise.all([...packs.values()].map((pack) => pack.close()));
  }

  private async readLoose(sha: string): Promise<RawObject | null> {
    const compressed = await FileUtils.readFileIfExists(this.resolveObjectPath(sha));
    if (!compressed) return null;

    try {
      const data = await CompressionUtils.decompress(compressed);
      const { type, contentStartsAt } = GitObject.parseHeader(data);
      return { type, content: data.subarray(contentStartsAt) };
    } catch (error) {
      throw new ObjectException(`Failed to read object: ${sha}`, error);
    }
  }

  private async readPacked(sha: string, rescan: boolean): Promise<RawObject | null> {
    const packs = await this.loadPacks(rescan);
    for (const pack of packs.values()) {
      if (!pack.has(sha)) continue;
      return await pack.read(sha, (base) => this.readRawObject(base));
    }
    return null;
  }

  /**
   * Opens every `pack-*.idx` with its `.pack`. With `rescan`, packs that appeared
   * since the last scan are opened too.
   */
  private async loadPacks(rescan: boolean): Promise<Map<string, PackFile>> {
    if (this.packs && !rescan) return this.packs;

    const packs = this.packs ?? new Map<string, PackFile>();
    const packDir = path.join(this.objectsPath, 'pack');
    const indexFiles = await glob('pack-*.idx', { cwd: packDir, absolute: true });

    for (const indexPath of indexFiles.sort()) {
      if (packs.has(indexPath)) continue;
      const packPath = indexPath.replace(/\.idx$/, '.pack');
      if (!(await FileUtils.exists(packPath))) {
        logger.debug(`skipping pack index without pack: ${indexPath}`);
        continue;
      }
      packs.set(indexPath, await PackFile.open(packPath, indexPath));
    }

    this.packs = packs;
    return packs;
  }

  private resolveObjectPath(sha: string): string {
    return path.join(this.objectsPath, sha.substring(0, 2), sha.substring(2));
  }
}
