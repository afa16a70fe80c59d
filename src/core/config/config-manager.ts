import path from 'path';
import os from 'os';
import { ConfigException } from '@/core/exceptions';
import { CONFIG_LEVEL_ORDER, ConfigEntry, ConfigLevel } from './config-level';
import { ConfigStore } from './config-store';

export interface ConfigLocations {
  /** Repository `.git` directory; omitted outside a repository. */
  gitDir?: string;
  home?: string;
  xdgConfigHome?: string;
  systemPath?: string | null;
}

/**
 * Resolves configuration across system, user, repository and command-line
 * levels. When a key is set several times, the last entry of the highest
 * level wins, as in Git.
 */
export class GitConfigManager {
  public static readonly SYSTEM_CONFIG_PATH = path.join('/', 'etc', 'gitconfig');
  public static readonly USER_CONFIG_FILE = '.gitconfig';
  public static readonly REPOSITORY_CONFIG_FILE = 'config';

  private readonly stores: ConfigStore[] = [];
  private readonly commandLine: ConfigEntry[] = [];

  constructor(locations: ConfigLocations = {}) {
    const env = process.env;
    const home = locations.home ?? env['HOME'] ?? os.homedir();
    const xdg = locations.xdgConfigHome ?? env['XDG_CONFIG_HOME'] ?? path.join(home, '.config');

    let systemPath: string | null = locations.systemPath ?? GitConfigManager.SYSTEM_CONFIG_PATH;
    if (locations.systemPath === undefined && env['GIT_CONFIG_NOSYSTEM']) systemPath = null;

    if (systemPath) this.stores.push(new ConfigStore(systemPath, ConfigLevel.SYSTEM));
    this.stores.push(new ConfigStore(path.join(xdg, 'git', 'config'), ConfigLevel.USER));
    this.stores.push(
      new ConfigStore(path.join(home, GitConfigManager.USER_CONFIG_FILE), ConfigLevel.USER)
    );
    if (locations.gitDir) {
      this.stores.push(
        new ConfigStore(
          path.join(locations.gitDir, GitConfigManager.REPOSITORY_CONFIG_FILE),
          ConfigLevel.REPOSITORY
        )
      );
    }
  }

  public async load(): Promise<void> {
    for (const store of this.stores) {
      await store.load();
    }
  }

  /**
   * Add a `-c key=value` override. A bare `key` means true.
   */
  public setCommandLine(assignment: string): void {
    const eq = assignment.indexOf('=');
    const key = eq === -1 ? assignment : assignment.substring(0, eq);
    const first = key.indexOf('.');
    const last = key.lastIndexOf('.');
    if (first <= 0 || last === key.length - 1) {
      throw new ConfigException(`invalid config key in '-c ${assignment}'`);
    }

    const subsection =
      first === last ? null : Buffer.from(key.substring(first + 1, last), 'utf8');
    const raw = eq === -1 ? null : Buffer.from(assignment.substring(eq + 1), 'utf8');
    this.commandLine.push(
      new ConfigEntry(
        key.substring(0, first).toLowerCase(),
        subsection,
        key.substring(last + 1).toLowerCase(),
        raw,
        ConfigLevel.COMMAND_LINE,
        'command-line',
        0
      )
    );
  }

  /**
   * Effective entry for `section[.subsection].name`. The subsection is given
   * as text and matched against the stored bytes.
   */
  public get(section: string, subsection: string | null, name: string): ConfigEntry | null {
    const entries = this.getAll(section, subsection, name);
    return entries[entries.length - 1] ?? null;
  }

  /**
   * Every entry for the key, lowest precedence first.
   */
  public getAll(section: string, subsection: string | null, name: string): ConfigEntry[] {
    const key = ConfigEntry.keyOf(
      section,
      subsection === null ? null : Buffer.from(subsection, 'utf8'),
      name
    );
    return this.entriesInOrder().filter((entry) => entry.key === key);
  }

  public getBoolean(
    section: string,
    subsection: string | null,
    name: string,
    fallback: boolean
  ): boolean {
    const entry = this.get(section, subsection, name);
    return entry ? entry.asBoolean() : fallback;
  }

  /**
   * Distinct subsection names of `section` (e.g. every configured remote),
   * as raw bytes, in order of first appearance.
   */
  public subsections(section: string): Buffer[] {
    const seen = new Map<string, Buffer>();
    const wanted = section.toLowerCase();
    for (const entry of this.entriesInOrder()) {
      if (entry.section !== wanted || entry.subsection === null) continue;
      const id = entry.subsection.toString('hex');
      if (!seen.has(id)) seen.set(id, entry.subsection);
    }
    return [...seen.values()];
  }

  public list(): ConfigEntry[] {
    return this.entriesInOrder();
  }

  private entriesInOrder(): ConfigEntry[] {
    const entries: ConfigEntry[] = [];
    for (const level of CONFIG_LEVEL_ORDER) {
      if (level === ConfigLevel.COMMAND_LINE) {
        entries.push(...this.commandLine);
        continue;
      }
      for (const store of this.stores) {
        if (store.level === level) entries.push(...store.getAllEntries());
      }
    }
    return entries;
  }
}
