export * from './types';
export type { RepositoryStore } from './repository-store';
export {
  SyncException,
  InvalidNameException,
  NoCurrentBranchException,
  NoRemoteException,
  FetchException,
} from './exceptions';
export { NameValidator } from './name-validator';
export { RemoteResolver } from './remote-resolver';
export {
  DefaultBranchDetector,
  NO_DEFAULT_BRANCH,
  type DefaultBranch,
  type DefaultBranchSource,
} from './default-branch';
export { FetchOrchestrator } from './fetch-orchestrator';
export { DecisionEngine, type DecisionContext } from './decision-engine';
export { Executor, type ExecutorOptions, type SyncState } from './executor';
export { EventTally, CollectingSink, type EventCounts } from './reporting';
export { SyncEngine, type SyncOptions, type SyncResolution, type SyncSummary } from './sync-engine';
export { GitRepositoryStore } from './git-repository-store';
