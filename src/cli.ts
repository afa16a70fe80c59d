#!/usr/bin/env node

import { Command, CommanderError } from 'commander';
import { logger } from '@/utils';
import { displayError, displayVersion, formatHelp, packageInfo } from '@/utils/cli';
import { spinner } from '@/utils/spinner';
import { syncCommand, type GlobalOptions } from '@/commands';

const collect = (value: string, previous: string[]): string[] => [...previous, value];

const program = new Command();

program
  .name('refsync')
  .description('Bring local branches in line with their remote in one pass')
  .version(packageInfo.version, '-v, --version', 'Display version information')
  .option('-C <path>', 'Run as if started in <path>')
  .option('-c, --config <key=value>', 'Set a configuration value for this run', collect, [])
  .option('-V, --verbose', 'Show skipped branches and ref writes')
  .option('-q, --quiet', 'Only report errors')
  .configureHelp({
    formatHelp: (cmd) => formatHelp(cmd),
  })
  .hook('preAction', (thisCommand) => {
    const options = thisCommand.opts<GlobalOptions>();

    if (options.quiet) {
      logger.level = 'error';
    } else if (options.verbose) {
      logger.level = 'debug';
    }
  });

program.addCommand(syncCommand, { isDefault: true });

program.exitOverride();

const main = async (): Promise<void> => {
  try {
    await program.parseAsync();
  } catch (error) {
    spinner.stop();
    if (error instanceof CommanderError) {
      if (error.code === 'commander.version') {
        displayVersion();
        process.exit(0);
      }
      if (error.code === 'commander.helpDisplayed' || error.code === 'commander.help') {
        process.exit(0);
      }
      process.exit(error.exitCode);
    }

    displayError(error instanceof Error ? error : new Error(String(error)));
    process.exit(1);
  }
};

void main();
