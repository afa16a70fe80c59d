import { ConfigException } from '@/core/exceptions';
import { ConfigEntry, ConfigLevel } from './config-level';

/**
 * Parses Git's INI-style configuration format:
 *
 * ```
 * [core]
 *     bare = false
 * [remote "origin"]
 *     url = https://example.com/repo.git
 *     fetch = +refs/heads/*:refs/remotes/origin/*
 * [branch "main"]
 *     remote = origin
 *     merge = refs/heads/main   ; trailing comment
 * [refsync]
 *     dryRun                    # no "=" means true
 * ```
 *
 * Section and key names are case-insensitive, subsections are not. Values may
 * be quoted, use `\n`, `\t`, `\b`, `\\` and `\"` escapes, and continue on the
 * next line after a trailing backslash. The file is decoded byte-for-byte
 * (latin1) so that non-UTF-8 names survive until they are validated.
 */
export class ConfigParser {
  private static readonly UTF8_BOM = '\u00ef\u00bb\u00bf';

  private pos = 0;
  private line = 1;
  private section: string | null = null;
  private subsection: Buffer | null = null;
  private readonly entries: ConfigEntry[] = [];

  private constructor(
    private readonly text: string,
    private readonly source: string,
    private readonly level: ConfigLevel
  ) {}

  public static parse(content: Buffer, source: string, level: ConfigLevel): ConfigEntry[] {
    const text = content.toString('latin1');
    const body = text.startsWith(ConfigParser.UTF8_BOM) ? text.slice(3) : text;
    return new ConfigParser(body, source, level).run();
  }

  private run(): ConfigEntry[] {
    for (;;) {
      this.skipWhitespace();
      const c = this.peek();
      if (c === undefined) break;

      if (c === '#' || c === ';') this.skipLine();
      else if (c === '[') this.parseSectionHeader();
      else if (ConfigParser.isAlpha(c)) this.parseVariable();
      else this.fail(`unexpected character '${c}'`);
    }
    return this.entries;
  }

  private parseSectionHeader(): void {
    this.pos++;
    let name = '';
    while (this.peek() !== undefined && /[A-Za-z0-9.-]/.test(this.peek() ?? '')) {
      name += this.next();
    }
    if (!name) this.fail('empty section name');

    let subsection: string | null = null;
    if (this.peek() === ' ' || this.peek() === '\t') {
      while (this.peek() === ' ' || this.peek() === '\t') this.pos++;
      if (this.next() !== '"') this.fail('expected quoted subsection');
      subsection = '';
      for (;;) {
        const c = this.next();
        if (c === undefined || c === '\n') this.fail('unterminated subsection');
        if (c === '"') break;
        if (c === '\\') {
          const escaped = this.next();
          if (escaped === undefined || escaped === '\n') this.fail('unterminated subsection');
          subsection += escaped;
        } else {
          subsection += c;
        }
      }
    }
    if (this.next() !== ']') this.fail('expected "]" after section header');

    if (subsection === null && name.includes('.')) {
      // deprecated [section.subsection] form, subsection is lowercased
      const dot = name.indexOf('.');
      subsection = name.substring(dot + 1).toLowerCase();
      name = name.substring(0, dot);
    }

    this.section = name.toLowerCase();
    this.subsection = subsection === null ? null : Buffer.from(subsection, 'latin1');
  }

  private parseVariable(): void {
    const lineNumber = this.line;
    let name = '';
    while (/[A-Za-z0-9-]/.test(this.peek() ?? '')) name += this.next();

    if (this.section === null) this.fail(`key '${name}' outside of a section`);
    const section = this.section;

    while (this.peek() === ' ' || this.peek() === '\t') this.pos++;
    const c = this.peek();

    let raw: Buffer | null = null;
    if (c === '=') {
      this.pos++;
      raw = Buffer.from(this.parseValue(), 'latin1');
    } else if (c === '#' || c === ';') {
      this.skipLine();
    } else if (c === '\r') {
      this.pos++;
    } else if (c !== undefined && c !== '\n') {
      this.fail(`invalid key '${name}'`);
    }

    this.entries.push(
      new ConfigEntry(section, this.subsection, name, raw, this.level, this.source, lineNumber)
    );
  }

  private parseValue(): string {
    let value = '';
    let pendingSpace = '';
    let quoted = false;

    for (;;) {
      const c = this.peek();
      if (c === undefined) break;
      if (c === '\n' || (c === '\r' && this.text[this.pos + 1] === '\n')) {
        if (quoted) this.fail('unterminated quoted value');
        break;
      }
      this.pos++;

      if (!quoted && (c === ' ' || c === '\t')) {
        if (value.length > 0) pendingSpace += c;
        continue;
      }
      if (!quoted && (c === '#' || c === ';')) {
        this.skipLine();
        break;
      }

      value += pendingSpace;
      pendingSpace = '';

      if (c === '"') {
        quoted = !quoted;
      } else if (c === '\\') {
        value += this.parseEscape();
      } else {
        value += c;
      }
    }
    return value;
  }

  private parseEscape(): string {
    const c = this.next();
    switch (c) {
      case '\n':
        this.line++;
        return '';
      case '\r':
        if (this.peek() === '\n') {
          this.pos++;
          this.line++;
        }
        return '';
      case 'n':
        return '\n';
      case 't':
        return '\t';
      case 'b':
        return '\b';
      case '\\':
      case '"':
        return c;
      default:
        return this.fail(`invalid escape sequence '\\${c ?? ''}'`);
    }
  }

  private skipWhitespace(): void {
    for (;;) {
      const c = this.peek();
      if (c === '\n') this.line++;
      else if (c !== ' ' && c !== '\t' && c !== '\r') return;
      this.pos++;
    }
  }

  private skipLine(): void {
    while (this.peek() !== undefined && this.peek() !== '\n') this.pos++;
  }

  private peek(): string | undefined {
    return this.text[this.pos];
  }

  private next(): string | undefined {
    return this.text[this.pos++];
  }

  private fail(message: string): never {
    throw new ConfigException(`bad config line ${this.line} in ${this.source}: ${message}`);
  }

  private static isAlpha(c: string): boolean {
    return /[A-Za-z]/.test(c);
  }
}
