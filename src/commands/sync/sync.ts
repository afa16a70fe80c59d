import { Command } from 'commander';
import { runSync } from './sync.handler';

export type GlobalOptions = {
  C?: string;
  config: string[];
  verbose?: boolean;
  quiet?: boolean;
};

type SyncCommandOptions = {
  dryRun?: boolean;
  prune?: boolean;
};

/**
 * Fetch the current branch's remote, fast-forward local branches that fell
 * behind it and delete merged branches whose upstream was removed. The
 * checked-out branch is switched away from before it is deleted.
 */
export const syncCommand = new Command('sync')
  .description('Fetch the remote and bring local branches up to date with it')
  .option('-n, --dry-run', 'Report what would change without touching local branches')
  .option('--prune', 'Remove tracking refs of deleted remote branches (default)')
  .option('--no-prune', 'Keep tracking refs of deleted remote branches')
  .action(async (options: SyncCommandOptions, command: Command) => {
    const globals = command.optsWithGlobals<GlobalOptions & SyncCommandOptions>();

    await runSync({
      cwd: globals.C ?? process.cwd(),
      configOverrides: globals.config,
      ...(options.dryRun === undefined ? {} : { dryRun: options.dryRun }),
      ...(options.prune === undefined ? {} : { prune: options.prune }),
    });
  });
