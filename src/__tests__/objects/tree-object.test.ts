import { EntryType, TreeEntry, TreeObject } from '../../core/objects';

const SHA = 'e69de29bb2d1d6434b8b29ae775ad8c2e48c5391';

describe('TreeEntry', () => {
  test('normalizes legacy group-writable file modes', () => {
    expect(new TreeEntry('100664', 'a', SHA).mode).toBe(EntryType.REGULAR_FILE);
    expect(new TreeEntry('40000', 'dir', SHA).isDirectory()).toBe(true);
  });

  test('rejects unknown modes and invalid names', () => {
    expect(() => new TreeEntry('100600', 'a', SHA)).toThrow('Unknown mode: 100600');
    expect(() => new TreeEntry('100644', 'a/b', SHA)).toThrow('Invalid tree entry name: "a/b"');
    expect(() => new TreeEntry('100644', 'a', 'abc')).toThrow(
      "Invalid object id for tree entry 'a': abc"
    );
  });

  test('writes directories with the short mode', () => {
    const bytes = Buffer.from(new TreeEntry('040000', 'src', SHA).serialize());
    expect(bytes.subarray(0, 10).toString()).toBe('40000 src\0');
    expect(bytes.subarray(10).toString('hex')).toBe(SHA);
  });
});

describe('TreeObject', () => {
  test('sorts directories as if their names ended with "/"', () => {
    const tree = new TreeObject([
      new TreeEntry('040000', 'a', SHA),
      new TreeEntry('100644', 'a.txt', SHA),
      new TreeEntry('100755', 'a-b', SHA),
    ]);

    expect(tree.entries.map((entry) => entry.name)).toEqual(['a-b', 'a.txt', 'a']);
  });

  test('parses its own content back', () => {
    const tree = new TreeObject([
      new TreeEntry('100644', 'README.md', SHA),
      new TreeEntry('120000', 'link', SHA),
      new TreeEntry('040000', 'src', SHA),
    ]);

    const parsed = TreeObject.fromContent(tree.content());

    expect(parsed.entries.map((entry) => [entry.mode, entry.name, entry.sha])).toEqual([
      [EntryType.REGULAR_FILE, 'README.md', SHA],
      [EntryType.SYMBOLIC_LINK, 'link', SHA],
      [EntryType.DIRECTORY, 'src', SHA],
    ]);
  });

  test('rejects truncated content', () => {
    expect(() => TreeObject.fromContent(Buffer.from('100644 a\0abc'))).toThrow(
      'Invalid tree object: truncated entry'
    );
  });
});
