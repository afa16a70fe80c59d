import type { Refspec } from './refspec';
import type { CredentialProvider } from './credentials';

export interface FetchProgress {
  phase: string;
  loaded: number;
  total?: number;
}

export interface TransportFetchOptions {
  remote: string;
  refspecs: Refspec[];
  prune: boolean;
  credentials: CredentialProvider;
  onProgress?: (progress: FetchProgress) => void;
}

/**
 * Brings a remote's refs and the objects they reach into the local
 * repository, updating the tracking refs the refspecs name.
 */
export interface Transport {
  fetch(options: TransportFetchOptions): Promise<void>;
}
