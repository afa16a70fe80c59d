import inquirer from 'inquirer';
import { logger } from '@/utils';

export interface Credentials {
  username: string;
  password: string;
}

/**
 * One source of credentials. `provide` returns null when it has nothing
 * (more) to offer for the URL.
 */
export interface CredentialSource {
  readonly name: string;
  provide(url: string): Promise<Credentials | null>;
}

/**
 * What a transport asks when the server demands authentication. Each call
 * returns the next candidate; null means every source is exhausted.
 */
export interface CredentialProvider {
  next(url: string): Promise<Credentials | null>;
}

/**
 * Username and password written into the remote URL itself
 */
export class UrlCredentialSource implements CredentialSource {
  readonly name = 'url';

  async provide(url: string): Promise<Credentials | null> {
    let parsed: URL;
    try {
      parsed = new URL(url);
    } catch (error) {
      logger.debug(`remote url is not a URL, no embedded credentials: ${String(error)}`);
      return null;
    }
    if (!parsed.username) return null;
    return {
      username: decodeURIComponent(parsed.username),
      password: decodeURIComponent(parsed.password),
    };
  }
}

/**
 * REFSYNC_USERNAME/REFSYNC_PASSWORD, or a REFSYNC_TOKEN sent as the username
 */
export class EnvironmentCredentialSource implements CredentialSource {
  readonly name = 'environment';

  constructor(private readonly env: NodeJS.ProcessEnv = process.env) {}

  async provide(): Promise<Credentials | null> {
    const token = this.env['REFSYNC_TOKEN'];
    if (token) {
      return { username: token, password: 'x-oauth-basic' };
    }

    const username = this.env['REFSYNC_USERNAME'];
    if (username) {
      return { username, password: this.env['REFSYNC_PASSWORD'] ?? '' };
    }
    return null;
  }
}

export interface PromptOptions {
  /** Defaults to whether stdin is a terminal. */
  interactive?: boolean;
  /** Runs before the questions are shown, e.g. to clear a spinner off the line. */
  beforePrompt?: () => void;
}

/**
 * Asks on the terminal; silent when stdin is not interactive
 */
export class PromptCredentialSource implements CredentialSource {
  readonly name = 'prompt';
  private readonly interactive: boolean;
  private readonly beforePrompt: () => void;

  constructor(options: PromptOptions = {}) {
    this.interactive = options.interactive ?? process.stdin.isTTY === true;
    this.beforePrompt = options.beforePrompt ?? (() => undefined);
  }

  async provide(url: string): Promise<Credentials | null> {
    if (!this.interactive) return null;

    this.beforePrompt();
    const answers = await inquirer.prompt<Credentials>([
      {
        type: 'input',
        name: 'username',
        message: `Username for '${PromptCredentialSource.displayUrl(url)}':`,
      },
      {
        type: 'password',
        name: 'password',
        message: 'Password:',
        mask: '*',
      },
    ]);
    return answers.username ? answers : null;
  }

  private static displayUrl(url: string): string {
    try {
      const parsed = new URL(url);
      return `${parsed.protocol}//${parsed.host}`;
    } catch (error) {
      logger.debug(`cannot shorten remote url: ${String(error)}`);
      return url;
    }
  }
}

/**
 * Tries each source once, in order, across successive challenges.
 */
export class CredentialNegotiator implements CredentialProvider {
  private position = 0;

  constructor(private readonly sources: CredentialSource[]) {}

  static standard(
    prompt: PromptOptions = {},
    env: NodeJS.ProcessEnv = process.env
  ): CredentialNegotiator {
    return new CredentialNegotiator([
      new UrlCredentialSource(),
      new EnvironmentCredentialSource(env),
      new PromptCredentialSource(prompt),
    ]);
  }

  async next(url: string): Promise<Credentials | null> {
    while (this.position < this.sources.length) {
      const source = this.sources[this.position++];
      if (!source) break;

      const credentials = await source.provide(url);
      if (credentials) {
        logger.debug(`using credentials from ${source.name}`);
        return credentials;
      }
    }
    return null;
  }
}
