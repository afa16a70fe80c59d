import { ConfigException } from '@/core/exceptions';
import { FileUtils, logger } from '@/utils';
import { ConfigEntry, ConfigLevel } from './config-level';
import { ConfigParser } from './config-parser';

/**
 * Entries of a single configuration file, in file order.
 */
export class ConfigStore {
  private entries: ConfigEntry[] = [];

  constructor(
    readonly path: string,
    readonly level: ConfigLevel
  ) {}

  /**
   * Load the file. A missing file is an empty configuration; a malformed one
   * is an error.
   */
  public async load(): Promise<void> {
    let content: Buffer | null;
    try {
      content = await FileUtils.readFileIfExists(this.path);
    } catch (error) {
      throw new ConfigException(`could not read config file ${this.path}`, error);
    }

    if (!content) {
      this.entries = [];
      return;
    }

    this.entries = ConfigParser.parse(content, this.path, this.level);
    logger.debug(`loaded ${this.entries.length} config entries from ${this.path}`);
  }

  public getEntries(key: string): ConfigEntry[] {
    return this.entries.filter((entry) => entry.key === key);
  }

  public getAllEntries(): readonly ConfigEntry[] {
    return this.entries;
  }
}
