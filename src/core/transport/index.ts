export { TransportException } from './exceptions';
export { Refspec } from './refspec';
export {
  CredentialNegotiator,
  EnvironmentCredentialSource,
  PromptCredentialSource,
  UrlCredentialSource,
  type CredentialProvider,
  type CredentialSource,
  type Credentials,
  type PromptOptions,
} from './credentials';
export type { FetchProgress, Transport, TransportFetchOptions } from './transport';
export { LocalTransport } from './local-transport';
export { HttpTransport } from './http-transport';
export { TransportFactory, type RemoteDefinition } from './transport-factory';
export { GitRemoteFetcher, type RemoteFetcherOptions } from './remote-fetcher';
