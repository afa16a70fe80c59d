import { GitRepository, ObjectReader } from '@/core/repo';
import { CommitGraph } from '@/core/history';
import { ObjectType, parseObject, ObjectValidator } from '@/core/objects';
import { RefManager, RefNames } from '@/core/refs';
import { GitException } from '@/core/exceptions';
import { Queue, logger } from '@/utils';
import { TransportException } from './exceptions';
import { Refspec } from './refspec';
import type { Transport, TransportFetchOptions } from './transport';

interface AdvertisedRef {
  name: string; // latin1
  target: string;
}

/**
 * Fetches from another repository on the local file system by reading its
 * refs and copying the objects they reach.
 *
 * Objects are copied loose. The walk stops at objects the local repository
 * already holds, since everything they reach is present as well.
 */
export class LocalTransport implements Transport {
  constructor(
    private readonly repository: GitRepository,
    private readonly remotePath: string
  ) {}

  async fetch(options: TransportFetchOptions): Promise<void> {
    let source: GitRepository;
    try {
      source = await GitRepository.open(this.remotePath);
    } catch (error) {
      throw new TransportException(
        `'${this.remotePath}' does not appear to be a git repository`,
        error
      );
    }

    try {
      await this.fetchFrom(source, options);
    } catch (error) {
      if (error instanceof TransportException) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportException(`fetch from '${this.remotePath}' failed: ${reason}`, error);
    } finally {
      await source.close();
    }
  }

  private async fetchFrom(source: GitRepository, options: TransportFetchOptions): Promise<void> {
    const advertised = await LocalTransport.advertisedRefs(source.refs());
    options.onProgress?.({ phase: 'Listing refs', loaded: advertised.length });

    const updates = new Map<string, AdvertisedRef & { force: boolean }>();
    for (const ref of advertised) {
      for (const refspec of options.refspecs) {
        const destination = refspec.mapToDestination(ref.name);
        if (destination !== null && !updates.has(destination)) {
          updates.set(destination, { ...ref, force: refspec.force });
        }
      }
    }

    let copied = 0;
    for (const update of updates.values()) {
      copied += await this.copyObjects(source, update.target);
      options.onProgress?.({ phase: 'Copying objects', loaded: copied });
    }

    const refs = this.repository.refs();
    for (const [destination, update] of updates) {
      await this.writeTrackingRef(refs, destination, update.target, update.force);
    }

    if (options.prune) {
      await this.prune(refs, options.refspecs, advertised);
    }

    await this.recordRemoteHead(source.refs(), options);
  }

  private static async advertisedRefs(refs: RefManager): Promise<AdvertisedRef[]> {
    const records = await refs.listRefs('refs/');
    return records.map((record) => ({
      name: record.name.toString('latin1'),
      target: record.target,
    }));
  }

  /**
   * Copy every object reachable from `tip` that is missing locally
   */
  private async copyObjects(source: GitRepository, tip: string): Promise<number> {
    const local = this.repository.objectStore();
    const remote = source.objectStore();
    const pending = new Queue<string>([tip]);
    const seen = new Set<string>([tip]);
    let copied = 0;

    for (let sha = pending.shift(); sha !== undefined; sha = pending.shift()) {
      if (await local.hasObject(sha)) continue;

      const raw = await remote.readRawObject(sha);
      if (!raw) {
        throw new TransportException(`remote repository is missing object ${sha}`);
      }
      await local.writeRawObject(raw);
      copied++;

      for (const linked of LocalTransport.links(raw.type, raw.content)) {
        if (!seen.has(linked)) {
          seen.add(linked);
          pending.push(linked);
        }
      }
    }
    return copied;
  }

  private static links(type: ObjectType, content: Uint8Array): string[] {
    if (type === ObjectType.BLOB) return [];

    const object = parseObject(type, content);
    if (ObjectValidator.isCommit(object)) {
      return [object.treeSha, ...object.parentShas];
    }
    if (ObjectValidator.isTree(object)) {
      return object.entries.filter((entry) => !entry.isSubmodule()).map((entry) => entry.sha);
    }
    if (ObjectValidator.isTag(object)) {
      return [object.objectSha];
    }
    return [];
  }

  private async writeTrackingRef(
    refs: RefManager,
    destination: string,
    target: string,
    force: boolean
  ): Promise<void> {
    const name = Buffer.from(destination, 'latin1');
    const current = await refs.resolve(name);
    if (current === target) return;

    if (current !== null && !force && !(await this.isFastForward(current, target))) {
      logger.warn(`! [rejected] ${destination} (non-fast-forward)`);
      return;
    }
    await refs.updateRef(name, target, current);
  }

  private async isFastForward(from: string, to: string): Promise<boolean> {
    try {
      const [fromObject, toObject] = await Promise.all([
        ObjectReader.peelToCommit(this.repository, from),
        ObjectReader.peelToCommit(this.repository, to),
      ]);
      return await new CommitGraph(this.repository).isAncestor(fromObject.sha(), toObject.sha());
    } catch (error) {
      if (!(error instanceof GitException)) throw error;
      logger.debug(`cannot compare ${from} and ${to}: ${error.message}`);
      return false;
    }
  }

  /**
   * Delete tracking refs whose source no longer exists on the remote
   */
  private async prune(
    refs: RefManager,
    refspecs: Refspec[],
    advertised: AdvertisedRef[]
  ): Promise<void> {
    const available = new Set(advertised.map((ref) => ref.name));

    for (const refspec of refspecs) {
      const star = refspec.destination.indexOf('*');
      const prefix =
        star === -1
          ? refspec.destination
          : refspec.destination.substring(0, refspec.destination.lastIndexOf('/', star) + 1);
      if (!prefix.endsWith('/')) continue;

      for (const record of await refs.listRefs(prefix)) {
        const local = record.name.toString('latin1');
        const sourceName = refspec.mapToSource(local);
        if (sourceName !== null && !available.has(sourceName)) {
          await refs.deleteRef(record.name, record.target);
        }
      }
    }
  }

  /**
   * Record the remote's symbolic HEAD as `refs/remotes/<remote>/HEAD`
   */
  private async recordRemoteHead(
    sourceRefs: RefManager,
    options: TransportFetchOptions
  ): Promise<void> {
    const target = await sourceRefs.readSymbolic(RefManager.HEAD_FILE);
    if (!target) return;

    const name = target.toString('latin1');
    for (const refspec of options.refspecs) {
      const mapped = refspec.mapToDestination(name);
      if (mapped !== null) {
        const local = this.repository.refs();
        if ((await local.resolve(Buffer.from(mapped, 'latin1'))) === null) return;
        await local.setSymbolicRef(
          RefNames.remoteHead(options.remote),
          Buffer.from(mapped, 'latin1')
        );
        return;
      }
    }
  }
}
