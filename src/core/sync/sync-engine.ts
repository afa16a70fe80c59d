import type { CredentialProvider } from '@/core/transport/credentials';
import type { RepositoryStore } from './repository-store';
import type { LocalBranch, RefChanges, RemoteFetcher, ReportingSink } from './types';
import { NameValidator } from './name-validator';
import { RemoteResolver } from './remote-resolver';
import { DefaultBranchDetector, type DefaultBranch } from './default-branch';
import { FetchOrchestrator } from './fetch-orchestrator';
import { DecisionEngine } from './decision-engine';
import { Executor, type SyncState } from './executor';
import { EventTally, type EventCounts } from './reporting';
import { NoCurrentBranchException } from './exceptions';

export interface SyncOptions {
  dryRun: boolean;
  credentials: CredentialProvider;
  /** Called once the main remote and default branch are known. */
  onResolved?: (resolution: SyncResolution) => void;
}

export interface SyncResolution {
  currentBranch: string;
  mainRemote: string;
  defaultBranch: DefaultBranch;
}

export interface SyncSummary extends SyncResolution {
  /** Branch checked out when the run ended. */
  finalBranch: string;
  dryRun: boolean;
  counts: EventCounts;
}

/**
 * One reconciliation pass: validate names, resolve the main remote, fetch
 * it, find its default branch, then decide and apply each local branch in
 * name order.
 */
export class SyncEngine {
  constructor(
    private readonly store: RepositoryStore,
    private readonly fetcher: RemoteFetcher,
    private readonly sink: ReportingSink
  ) {}

  async run(options: SyncOptions): Promise<SyncSummary> {
    const tally = new EventTally(this.sink);
    const resolver = new RemoteResolver(this.store);

    const rawCurrent = await this.store.currentBranch();
    if (rawCurrent === null) {
      throw new NoCurrentBranchException();
    }
    const currentBranch = NameValidator.decode(rawCurrent, 'branch');
    const remotes = (await this.store.remoteNames()).map((raw) =>
      NameValidator.decode(raw, 'remote')
    );
    const locals = await this.readLocalBranches(resolver);

    const mainRemote = await resolver.resolveMainRemote(currentBranch, remotes);

    const changes = await new FetchOrchestrator(this.fetcher, this.store, tally).fetch(
      mainRemote,
      options.credentials
    );

    for (const tracking of await this.store.remoteTrackingBranches(mainRemote)) {
      NameValidator.decode(tracking.name, 'branch');
    }

    const defaultBranch = await new DefaultBranchDetector(this.store).detect(mainRemote, locals);
    options.onResolved?.({ currentBranch, mainRemote, defaultBranch });

    this.reportNewBranches(changes, mainRemote, locals, tally, options.dryRun);

    const state: SyncState = { current: currentBranch };
    const engine = new DecisionEngine(this.store);
    const executor = new Executor(this.store, tally, {
      dryRun: options.dryRun,
      defaultBranch: defaultBranch.name,
    });

    for (const branch of locals) {
      const decision = await engine.decide(branch, {
        mainRemote,
        alternateRemote: defaultBranch.alternateRemote,
        defaultBranch,
        currentBranch: state.current,
      });
      await executor.apply(decision, state);
    }

    return {
      currentBranch,
      mainRemote,
      defaultBranch,
      finalBranch: state.current,
      dryRun: options.dryRun,
      counts: tally.counts,
    };
  }

  /**
   * Every local branch, validated and sorted by name, with its upstream
   */
  private async readLocalBranches(resolver: RemoteResolver): Promise<LocalBranch[]> {
    const refs = [...(await this.store.localBranches())].sort((a, b) =>
      Buffer.compare(a.name, b.name)
    );

    const branches: LocalBranch[] = [];
    for (const ref of refs) {
      const name = NameValidator.decode(ref.name, 'branch');
      branches.push({ name, target: ref.target, upstream: await resolver.upstreamOf(name) });
    }
    return branches;
  }

  private reportNewBranches(
    changes: RefChanges,
    mainRemote: string,
    locals: LocalBranch[],
    sink: ReportingSink,
    dryRun: boolean
  ): void {
    for (const change of changes) {
      if (change.oldId !== null || change.newId === null) continue;

      const branch = change.branch.toString('utf8');
      const tracked = locals.some(
        (local) => local.upstream?.remote === mainRemote && local.upstream.branch === branch
      );
      if (tracked) continue;

      sink.emit({
        kind: 'new-remote-branch',
        branch,
        remote: mainRemote,
        oldId: null,
        newId: change.newId,
        dryRun,
      });
    }
  }
}
