import * as git from 'isomorphic-git';
import http from 'isomorphic-git/http/node';
import fs from 'fs';
import type { GitAuth, GitProgressEvent } from 'isomorphic-git';
import type { GitRepository } from '@/core/repo';
import { RefNames } from '@/core/refs';
import { logger } from '@/utils';
import { TransportException } from './exceptions';
import type { Transport, TransportFetchOptions } from './transport';

/**
 * Smart-HTTP fetch through isomorphic-git, which writes the received pack
 * and the tracking refs straight into the repository.
 */
export class HttpTransport implements Transport {
  constructor(
    private readonly repository: GitRepository,
    private readonly url: string
  ) {}

  async fetch(options: TransportFetchOptions): Promise<void> {
    const gitdir = this.repository.gitDirectory().fullpath();
    const authenticate = async (url: string): Promise<GitAuth> => {
      const credentials = await options.credentials.next(url);
      return credentials ?? { cancel: true };
    };

    let defaultBranch: string | null;
    try {
      const result = await git.fetch({
        fs,
        http,
        gitdir,
        url: this.url,
        remote: options.remote,
        singleBranch: false,
        tags: false,
        prune: options.prune,
        onAuth: authenticate,
        onAuthFailure: authenticate,
        onProgress: (event: GitProgressEvent) =>
          options.onProgress?.({ phase: event.phase, loaded: event.loaded, total: event.total }),
      });
      defaultBranch = result.defaultBranch;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new TransportException(
        `unable to access '${HttpTransport.redact(this.url)}': ${reason}`,
        error
      );
    }

    if (defaultBranch) {
      await this.recordRemoteHead(defaultBranch, options);
    }
  }

  private async recordRemoteHead(
    defaultBranch: string,
    options: TransportFetchOptions
  ): Promise<void> {
    const refs = this.repository.refs();
    for (const refspec of options.refspecs) {
      const mapped = refspec.mapToDestination(defaultBranch);
      if (mapped === null) continue;

      if ((await refs.resolve(mapped)) !== null) {
        await refs.setSymbolicRef(RefNames.remoteHead(options.remote), mapped);
      } else {
        logger.debug(`remote default branch ${defaultBranch} has no tracking ref`);
      }
      return;
    }
  }

  /**
   * The URL without any password it carries
   */
  static redact(url: string): string {
    try {
      const parsed = new URL(url);
      if (parsed.password) parsed.password = '***';
      return parsed.toString();
    } catch (error) {
      logger.debug(`cannot parse remote url for display: ${String(error)}`);
      return url;
    }
  }
}
