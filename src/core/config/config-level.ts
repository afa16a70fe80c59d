import { ConfigException } from '@/core/exceptions';

/**
 * Configuration levels, lowest precedence first
 */
export enum ConfigLevel {
  SYSTEM = 'system', // /etc/gitconfig
  USER = 'user', // $XDG_CONFIG_HOME/git/config, ~/.gitconfig
  REPOSITORY = 'repository', // .git/config
  COMMAND_LINE = 'command-line', // -c remote.pushDefault=origin
}

export const CONFIG_LEVEL_ORDER: readonly ConfigLevel[] = [
  ConfigLevel.SYSTEM,
  ConfigLevel.USER,
  ConfigLevel.REPOSITORY,
  ConfigLevel.COMMAND_LINE,
];

/**
 * Represents a single configuration entry with its value and metadata.
 *
 * Values are kept as the raw bytes found in the file; a key written without
 * "=" has no value at all, which Git reads as boolean true.
 */
export class ConfigEntry {
  constructor(
    readonly section: string,
    readonly subsection: Buffer | null,
    readonly name: string,
    readonly raw: Buffer | null,
    readonly level: ConfigLevel,
    readonly source: string,
    readonly lineNumber: number
  ) {}

  /**
   * Lookup key: section and name lowercased, subsection bytes kept as latin1 text.
   */
  get key(): string {
    return ConfigEntry.keyOf(this.section, this.subsection, this.name);
  }

  get value(): string | null {
    return this.raw === null ? null : this.raw.toString('utf8');
  }

  asString(): string {
    return this.value ?? '';
  }

  asBoolean(): boolean {
    if (this.raw === null) return true;
    const lower = this.asString().trim().toLowerCase();
    if (['true', 'yes', 'on', '1'].includes(lower)) return true;
    if (['false', 'no', 'off', '0', ''].includes(lower)) return false;
    throw new ConfigException(`bad boolean config value '${this.asString()}' for '${this.key}'`);
  }

  asNumber(): number {
    const num = Number(this.asString());
    if (Number.isNaN(num)) {
      throw new ConfigException(`bad numeric config value '${this.asString()}' for '${this.key}'`);
    }
    return num;
  }

  static keyOf(section: string, subsection: Buffer | null, name: string): string {
    const parts = [section.toLowerCase()];
    if (subsection !== null) parts.push(subsection.toString('latin1'));
    parts.push(name.toLowerCase());
    return parts.join('.');
  }
}
