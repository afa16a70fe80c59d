import chalk from 'chalk';
import { display } from './display';
import { Command } from 'commander';
import * as fs from 'fs';
import * as path from 'path';

export interface PackageInfo {
  name: string;
  version: string;
  description: string;
  license: string;
}

const readPackageInfo = (): PackageInfo => {
  const parsed: unknown = JSON.parse(
    fs.readFileSync(path.join(__dirname, '../../../package.json'), 'utf8')
  );
  const field = (key: string): string => {
    if (typeof parsed === 'object' && parsed !== null && key in parsed) {
      const value: unknown = Reflect.get(parsed, key);
      if (typeof value === 'string') return value;
    }
    return 'unknown';
  };
  return {
    name: field('name'),
    version: field('version'),
    description: field('description'),
    license: field('license'),
  };
};

export const packageInfo: PackageInfo = readPackageInfo();

/**
 * Help text for the root command
 */
const formatHelp = (cmd: Command): string => {
  const commandName = chalk.cyan.bold(cmd.name());
  const description = chalk.gray(cmd.description());

  let help = `${commandName} - ${description}\n\n`;

  help += `${chalk.yellow.bold('Usage:')}\n`;
  help += `  ${chalk.green('$')} ${commandName} ${chalk.gray('[options]')} ${chalk.gray('[command]')}\n\n`;

  const options = cmd.options;
  if (options.length > 0) {
    help += `${chalk.yellow.bold('Options:')}\n`;
    const maxLength = Math.max(...options.map((option) => option.flags.length));
    for (const option of options) {
      help += `  ${chalk.green(option.flags.padEnd(maxLength))}  ${chalk.gray(option.description)}\n`;
    }
    help += '\n';
  }

  const commands = cmd.commands;
  if (commands.length > 0) {
    help += `${chalk.yellow.bold('Commands:')}\n`;
    const maxLength = Math.max(...commands.map((command) => command.name().length));

    commands.forEach((command) => {
      const name = command.name().padEnd(maxLength);
      const desc = command.description() || '';
      help += `  ${chalk.green(name)}  ${chalk.gray(desc)}\n`;
    });
    help += '\n';
  }

  help += chalk.yellow.bold('Examples:') + '\n';
  help += `  ${chalk.green('$')} ${commandName} ${chalk.gray('# Fetch and reconcile local branches')}\n`;
  help += `  ${chalk.green('$')} ${commandName} --dry-run ${chalk.gray('# Show what would change')}\n`;
  help += `  ${chalk.green('$')} ${commandName} -C ../other ${chalk.gray('# Run in another repository')}\n\n`;

  help +=
    chalk.gray('For more information on a command, run: ') +
    chalk.green(`${commandName} help <command>`) +
    '\n';

  return help;
};

const displayVersion = (): void => {
  const systemInfo = [
    `${chalk.bold.blue(packageInfo.name)} ${chalk.green(`v${packageInfo.version}`)}`,
    '',
    `${chalk.gray('Runtime Information:')}`,
    `  ${chalk.gray('Node.js:')} ${chalk.cyan(process.version)}`,
    `  ${chalk.gray('Platform:')} ${chalk.cyan(process.platform)} ${chalk.cyan(process.arch)}`,
    '',
    `  ${chalk.gray('License:')} ${chalk.yellow(packageInfo.license)}`,
    `  ${chalk.gray('Description:')} ${chalk.white(packageInfo.description)}`,
  ].join('\n');

  display.highlight(systemInfo, 'Version Information');
};

/**
 * Boxed display for errors that end the run
 */
const displayError = (error: Error): void => {
  const errorContent = [
    `${chalk.gray('Error Type:')} ${chalk.red(error.name || 'Unknown Error')}`,
    `${chalk.gray('Message:')} ${chalk.red(error.message)}`,
    '',
    `  ${chalk.blue('Tip:')} Use ${chalk.green('--verbose')} for detailed logs`,
  ].join('\n');

  display.error(errorContent, 'fatal');
};

export { formatHelp, displayVersion, displayError };
