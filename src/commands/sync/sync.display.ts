import chalk from 'chalk';
import { display, logger } from '@/utils';
import type {
  DecisionKind,
  ReportingSink,
  SyncEvent,
  SyncResolution,
  SyncSummary,
} from '@/core/sync';

const SHORT_ID = 7;
const SUMMARY_WIDTH = 2 * SHORT_ID + 3;

const ACTION_VERBS: Record<DecisionKind, string> = {
  skip: 'skip',
  'fast-forward': 'update',
  delete: 'delete',
  'switch-and-delete': 'switch away from and delete',
  warn: 'check',
};

const short = (id: string | null): string => (id ?? '').substring(0, SHORT_ID);

interface RefLine {
  code: string;
  summary: string;
  from: string;
  to: string;
  note: string;
}

/**
 * Prints sync events in the wording of `git fetch` and `git branch`.
 *
 * Fetch results arrive before the run knows its default branch, so they are
 * held back and printed under the header once `resolved` is called.
 */
export class ConsoleReporter implements ReportingSink {
  private pending: RefLine[] | null = [];

  emit(event: SyncEvent): void {
    switch (event.kind) {
      case 'remote-ref-created':
        return this.refLine({ code: '*', summary: '[new branch]', ...this.names(event), note: '' });
      case 'remote-ref-updated':
        return this.refLine(
          event.forced
            ? {
                code: '+',
                summary: `${short(event.oldId)}...${short(event.newId)}`,
                ...this.names(event),
                note: '  (forced update)',
              }
            : {
                code: ' ',
                summary: `${short(event.oldId)}..${short(event.newId)}`,
                ...this.names(event),
                note: '',
              }
        );
      case 'remote-ref-deleted':
        return this.refLine({
          code: '-',
          summary: '[deleted]',
          from: '(none)',
          to: this.names(event).to,
          note: '',
        });
      case 'new-remote-branch':
        logger.log(
          chalk.gray(`${event.remote ?? ''}/${event.branch} is new and has no local branch`)
        );
        return;
      case 'updated':
        logger.log(
          `${this.prefix(event)}Updated branch ${chalk.bold(event.branch)} (was ${short(event.oldId)}).`
        );
        return;
      case 'switched-and-deleted':
        logger.log(`${this.prefix(event)}Switched to branch '${event.switchedTo}'`);
        logger.log(
          `${this.prefix(event)}Deleted branch ${chalk.bold(event.branch)} (was ${short(event.oldId)}).`
        );
        return;
      case 'deleted':
        logger.log(
          `${this.prefix(event)}Deleted branch ${chalk.bold(event.branch)} (was ${short(event.oldId)}).`
        );
        return;
      case 'skipped':
        logger.debug(`${event.branch}: skipped (${event.reason})`);
        return;
      case 'warning':
        logger.log(chalk.yellow(`warning: ${ConsoleReporter.warningText(event)}`));
        return;
      case 'failed':
        logger.error(
          `failed to ${ACTION_VERBS[event.action]} '${event.branch}': ${event.error.message}`
        );
        return;
    }
  }

  /**
   * Print the run header followed by the held-back fetch lines
   */
  resolved(resolution: SyncResolution): void {
    logger.log(`current branch: ${resolution.currentBranch}`);
    logger.log(`default remote: ${resolution.mainRemote}`);
    logger.log(`remote default: ${ConsoleReporter.defaultBranchText(resolution)}`);
    logger.newLine();

    const lines = this.pending ?? [];
    this.pending = null;
    if (lines.length === 0) return;

    const width = Math.max(...lines.map((line) => line.from.length));
    for (const line of lines) {
      logger.log(ConsoleReporter.formatRefLine(line, width));
    }
    logger.newLine();
  }

  static formatRefLine(line: RefLine, width: number): string {
    return ` ${line.code} ${line.summary.padEnd(SUMMARY_WIDTH)} ${line.from.padEnd(width)} -> ${line.to}${line.note}`;
  }

  static warningText(event: Extract<SyncEvent, { kind: 'warning' }>): string {
    switch (event.reason) {
      case 'diverged':
        return `'${event.branch}' seems to contain unpushed commits`;
      case 'unmerged':
        return `'${event.branch}' was deleted on ${event.remote ?? 'the remote'}, but appears not merged into '${event.defaultBranch ?? ''}'`;
      case 'no-default-branch':
        return `no default branch, skipping to delete '${event.branch}'`;
    }
  }

  static defaultBranchText(resolution: SyncResolution): string {
    const { name, source } = resolution.defaultBranch;
    if (name === null) return '(none)';
    return source === 'remote-head' ? `${resolution.mainRemote}/${name}` : `${name} (local)`;
  }

  private refLine(line: RefLine): void {
    if (this.pending) {
      this.pending.push(line);
    } else {
      logger.log(ConsoleReporter.formatRefLine(line, line.from.length));
    }
  }

  private names(event: SyncEvent): { from: string; to: string } {
    return { from: event.branch, to: `${event.remote ?? ''}/${event.branch}` };
  }

  private prefix(event: SyncEvent): string {
    return event.dryRun ? chalk.gray('(dry run) ') : '';
  }
}

/**
 * Boxed tally shown after the branch lines
 */
export const displaySummary = (summary: SyncSummary): void => {
  if (!logger.isEnabled('info')) return;

  const { counts } = summary;
  const row = (label: string, value: number, color: (text: string) => string): string =>
    `${chalk.gray(`${label}:`.padEnd(16))}${value > 0 ? color(String(value)) : chalk.gray('0')}`;

  const lines = [
    row('updated', counts.updated, chalk.green),
    row('deleted', counts.deleted + counts['switched-and-deleted'], chalk.green),
    row('new remote', counts['new-remote-branch'], chalk.cyan),
    row('warnings', counts.warning, chalk.yellow),
    row('failed', counts.failed, chalk.red),
  ];
  if (summary.finalBranch !== summary.currentBranch) {
    lines.push('', `${chalk.gray('now on:')} ${chalk.bold(summary.finalBranch)}`);
  }
  if (summary.dryRun) {
    lines.push('', chalk.gray('dry run: no local branch was changed'));
  }

  const content = lines.join('\n');
  if (counts.failed > 0) {
    display.warning(content, 'sync finished with failures');
  } else {
    display.success(content, summary.dryRun ? 'sync (dry run)' : 'sync');
  }
};
