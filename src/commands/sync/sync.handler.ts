import type { ConfigLocations } from '@/core/config';
import {
  GitRepositoryStore,
  SyncEngine,
  type RemoteFetcher,
  type ReportingSink,
  type SyncSummary,
} from '@/core/sync';
import {
  CredentialNegotiator,
  GitRemoteFetcher,
  type CredentialProvider,
  type FetchProgress,
  type PromptOptions,
} from '@/core/transport';
import { withRepository } from '@/utils/helpers/repo';
import { logger } from '@/utils';
import { spinner } from '@/utils/spinner';
import { ConsoleReporter, displaySummary } from './sync.display';

export interface SyncRunOptions {
  /** Directory the repository is discovered from. */
  cwd: string;
  /** Overrides `refsync.dryRun` when set. */
  dryRun?: boolean;
  /** Overrides `refsync.prune` when set. */
  prune?: boolean;
  configOverrides?: string[];
  configLocations?: Omit<ConfigLocations, 'gitDir'>;
  credentials?: CredentialProvider;
  /** Receives the events instead of the console. */
  reporter?: ReportingSink;
}

const progressText = (remote: string, progress: FetchProgress): string => {
  const amount =
    progress.total === undefined ? `${progress.loaded}` : `${progress.loaded}/${progress.total}`;
  return `Fetching ${remote}: ${progress.phase} (${amount})`;
};

/**
 * The standard credential chain, with the fetch spinner stopped before the
 * terminal prompt takes over the line
 */
export const terminalCredentials = (
  prompt: PromptOptions = {},
  env: NodeJS.ProcessEnv = process.env
): CredentialProvider =>
  CredentialNegotiator.standard({ ...prompt, beforePrompt: () => spinner.stop() }, env);

/**
 * Open the repository, fetch the current branch's remote and reconcile every
 * local branch with it
 */
export const runSync = async (options: SyncRunOptions): Promise<SyncSummary> => {
  const repositoryOptions = {
    configOverrides: options.configOverrides ?? [],
    ...(options.configLocations ? { configLocations: options.configLocations } : {}),
  };

  return await withRepository(options.cwd, repositoryOptions, async (repository) => {
    const config = repository.config();
    const dryRun = options.dryRun ?? config.getBoolean('refsync', null, 'dryrun', false);
    const prune = options.prune ?? config.getBoolean('refsync', null, 'prune', true);

    const consoleReporter = new ConsoleReporter();
    const toConsole = options.reporter === undefined;
    const showSpinner = toConsole && logger.isEnabled('info') && process.stderr.isTTY;

    let fetching = '';
    const fetcher = new GitRemoteFetcher(repository, {
      prune,
      onProgress: (progress) => spinner.update(progressText(fetching, progress)),
    });
    const fetcherWithSpinner: RemoteFetcher = {
      fetch: async (remote, credentials) => {
        fetching = remote;
        if (showSpinner) spinner.start({ text: `Fetching ${remote}` });
        try {
          const changes = await fetcher.fetch(remote, credentials);
          spinner.succeed(`Fetched ${remote}`);
          return changes;
        } catch (error) {
          spinner.fail(`Fetching ${remote} failed`);
          throw error;
        }
      },
    };

    const engine = new SyncEngine(
      new GitRepositoryStore(repository),
      fetcherWithSpinner,
      options.reporter ?? consoleReporter
    );
    const summary = await engine.run({
      dryRun,
      credentials: options.credentials ?? terminalCredentials(),
      onResolved: (resolution) => {
        if (toConsole) consoleReporter.resolved(resolution);
      },
    });

    if (toConsole) displaySummary(summary);
    return summary;
  });
};
