import path from 'path';
import { fileURLToPath } from 'url';
import type { GitRepository } from '@/core/repo';
import { TransportException } from './exceptions';
import { HttpTransport } from './http-transport';
import { LocalTransport } from './local-transport';
import { Refspec } from './refspec';
import type { Transport } from './transport';

export interface RemoteDefinition {
  name: string;
  url: string;
  refspecs: Refspec[];
}

/**
 * Picks the transport for a configured remote from the shape of its URL.
 */
export class TransportFactory {
  private static readonly SCP_LIKE = /^(?:[^@/]+@)?[^/:]+:(?!\/\/)/;

  static remoteDefinition(repository: GitRepository, remote: string): RemoteDefinition {
    const config = repository.config();
    const url = config.get('remote', remote, 'url')?.asString();
    if (!url) {
      throw new TransportException(`'${remote}' does not appear to be a git repository`);
    }

    const specs = config
      .getAll('remote', remote, 'fetch')
      .map((entry) => (entry.raw ?? Buffer.alloc(0)).toString('latin1'));
    const refspecs = Refspec.parseAll(specs);
    return {
      name: remote,
      url,
      refspecs: refspecs.length > 0 ? refspecs : [Refspec.defaultFor(remote)],
    };
  }

  static create(repository: GitRepository, url: string): Transport {
    if (/^https?:\/\//i.test(url)) {
      return new HttpTransport(repository, url);
    }
    if (/^file:\/\//i.test(url)) {
      return new LocalTransport(repository, fileURLToPath(url));
    }
    if (/^[a-z][a-z0-9+.-]*:\/\//i.test(url) || TransportFactory.SCP_LIKE.test(url)) {
      throw new TransportException(`unsupported remote URL '${HttpTransport.redact(url)}'`);
    }

    const base = (repository.workingDirectory() ?? repository.gitDirectory()).fullpath();
    return new LocalTransport(repository, path.resolve(base, url));
  }
}
