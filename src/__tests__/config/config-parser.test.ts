import { ConfigParser, ConfigLevel, ConfigEntry } from '../../core/config';
import { ConfigException } from '../../core/exceptions';

const parse = (text: string | Buffer): ConfigEntry[] =>
  ConfigParser.parse(
    typeof text === 'string' ? Buffer.from(text, 'utf8') : text,
    'test',
    ConfigLevel.REPOSITORY
  );

describe('ConfigParser.parse', () => {
  test('returns no entries for blank content', () => {
    expect(parse('  \n\n')).toEqual([]);
  });

  test('parses sections, subsections and trailing comments', () => {
    const entries = parse(
      [
        '# comment',
        '[core]',
        '\tbare = false',
        '[remote "origin"]',
        '\turl = https://example.com/repo.git',
        '\tfetch = +refs/heads/*:refs/remotes/origin/*',
        '[Branch "Main"]',
        '\tRemote = origin ; trailing',
        '\tmerge = refs/heads/main',
        '[refsync]',
        '\tdryRun',
        '',
      ].join('\n')
    );

    expect(entries.map((entry) => [entry.key, entry.value])).toEqual([
      ['core.bare', 'false'],
      ['remote.origin.url', 'https://example.com/repo.git'],
      ['remote.origin.fetch', '+refs/heads/*:refs/remotes/origin/*'],
      ['branch.Main.remote', 'origin'],
      ['branch.Main.merge', 'refs/heads/main'],
      ['refsync.dryrun', null],
    ]);
    expect(entries[0]?.lineNumber).toBe(3);
    expect(entries[0]?.source).toBe('test');
    expect(entries[0]?.level).toBe(ConfigLevel.REPOSITORY);
  });

  test('keeps quoted text and collapses unquoted spacing', () => {
    const [entry] = parse('[alias]\n\tgreeting = "hello  # world"  tail\n');
    expect(entry?.value).toBe('hello  # world  tail');
  });

  test('decodes escapes and line continuations', () => {
    const entries = parse(
      ['[x]', String.raw`  path = a\tb\\c\"d`, '  long = one \\', '  two', ''].join('\n')
    );
    expect(entries.map((entry) => entry.value)).toEqual(['a\tb\\c"d', 'one   two']);
  });

  test('handles CRLF line endings', () => {
    const entries = parse('[core]\r\n\tbare = true\r\n\tfilemode\r\n');
    expect(entries.map((entry) => [entry.key, entry.value])).toEqual([
      ['core.bare', 'true'],
      ['core.filemode', null],
    ]);
  });

  test('reads the deprecated dotted section form', () => {
    const [entry] = parse('[Branch.Topic]\n\tremote = upstream\n');
    expect(entry?.key).toBe('branch.topic.remote');
  });

  test('keeps subsection bytes that are not valid UTF-8', () => {
    const [entry] = parse(
      Buffer.concat([
        Buffer.from('[branch "'),
        Buffer.from([0xff]),
        Buffer.from('"]\n\tremote = origin\n'),
      ])
    );
    expect(entry?.subsection).toEqual(Buffer.from([0xff]));
    expect(entry?.value).toBe('origin');
  });

  test('skips a UTF-8 byte order mark', () => {
    const entries = parse(
      Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), Buffer.from('[core]\n\tbare\n')])
    );
    expect(entries.map((entry) => entry.key)).toEqual(['core.bare']);
  });

  test.each([
    ['bare = true\n', "bad config line 1 in test: key 'bare' outside of a section"],
    ['[core\n', 'bad config line 1 in test: expected "]" after section header'],
    ['[a]\n\tb = "x\n', 'bad config line 2 in test: unterminated quoted value'],
    ['[a]\n\tb = x\\q\n', "bad config line 2 in test: invalid escape sequence '\\q'"],
  ])('rejects %j', (text, message) => {
    expect(() => parse(text)).toThrow(new ConfigException(message));
  });
});

describe('ConfigEntry', () => {
  const entry = (raw: string | null) =>
    new ConfigEntry(
      'core',
      null,
      'x',
      raw === null ? null : Buffer.from(raw),
      ConfigLevel.USER,
      'test',
      1
    );

  test('reads booleans the way Git does', () => {
    expect(entry(null).asBoolean()).toBe(true);
    expect(entry('Yes').asBoolean()).toBe(true);
    expect(entry('1').asBoolean()).toBe(true);
    expect(entry('off').asBoolean()).toBe(false);
    expect(entry('').asBoolean()).toBe(false);
    expect(() => entry('maybe').asBoolean()).toThrow(
      "bad boolean config value 'maybe' for 'core.x'"
    );
  });

  test('reads numbers', () => {
    expect(entry('42').asNumber()).toBe(42);
    expect(() => entry('many').asNumber()).toThrow("bad numeric config value 'many' for 'core.x'");
  });
});
