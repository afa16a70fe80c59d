import { CommitObject, CommitPerson, ObjectType } from '../../core/objects';

const TREE = '4b825dc642cb6eb9a060e54bf8d69288fbee4904';
const PARENT = '1'.repeat(40);

describe('CommitPerson', () => {
  test('formats and parses the Git person line', () => {
    const person = CommitPerson.parseFromGit('Jane Doe <jane@example.com> 1700000000 -0130');

    expect(person.name).toBe('Jane Doe');
    expect(person.email).toBe('jane@example.com');
    expect(person.timestamp).toBe(1700000000);
    expect(person.offsetMinutes()).toBe(-90);
    expect(person.formatForGit()).toBe('Jane Doe <jane@example.com> 1700000000 -0130');
  });

  test('accepts an empty name and an email without "@"', () => {
    const person = CommitPerson.parseFromGit('<root> 0 +0000');
    expect(person.name).toBe('');
    expect(person.email).toBe('root');
  });

  test('rejects malformed lines', () => {
    expect(() => CommitPerson.parseFromGit('nope')).toThrow('Invalid person format: nope');
  });
});

describe('CommitObject', () => {
  const person = new CommitPerson('Test User', 'test@example.com', 1700000000, '+0200');

  test('serializes headers then message', () => {
    const commit = new CommitObject({
      treeSha: TREE,
      parentShas: [PARENT],
      author: person,
      committer: person,
      message: 'subject\n\nbody\n',
    });

    expect(commit.type()).toBe(ObjectType.COMMIT);
    expect(Buffer.from(commit.content()).toString()).toBe(
      [
        `tree ${TREE}`,
        `parent ${PARENT}`,
        'author Test User <test@example.com> 1700000000 +0200',
        'committer Test User <test@example.com> 1700000000 +0200',
        '',
        'subject',
        '',
        'body',
        '',
      ].join('\n')
    );
  });

  test('keeps the original bytes of a parsed commit with extra headers', () => {
    const raw = Buffer.from(
      [
        `tree ${TREE}`,
        `parent ${PARENT}`,
        `parent ${'2'.repeat(40)}`,
        'author A <a@example.com> 1 +0000',
        'committer B <b@example.com> 2 +0000',
        'gpgsig -----BEGIN PGP SIGNATURE-----',
        ' line one',
        ' -----END PGP SIGNATURE-----',
        'encoding UTF-8',
        '',
        'merge topic',
        '',
      ].join('\n')
    );

    const commit = CommitObject.fromContent(raw);

    expect(commit.treeSha).toBe(TREE);
    expect(commit.parentShas).toEqual([PARENT, '2'.repeat(40)]);
    expect(commit.author.name).toBe('A');
    expect(commit.committer.timestamp).toBe(2);
    expect(commit.message).toBe('merge topic\n');
    expect(Buffer.from(commit.content()).equals(raw)).toBe(true);
  });

  test('requires a tree and both people', () => {
    expect(() =>
      CommitObject.fromContent(Buffer.from('author A <a> 1 +0000\ncommitter A <a> 1 +0000\n\nx'))
    ).toThrow('Tree SHA is required');
    expect(() =>
      CommitObject.fromContent(Buffer.from(`tree ${TREE}\ncommitter A <a> 1 +0000\n\nx`))
    ).toThrow('Author is required');
  });

  test('rejects invalid object ids', () => {
    expect(
      () =>
        new CommitObject({
          treeSha: TREE,
          parentShas: ['xyz'],
          author: person,
          committer: person,
          message: '',
        })
    ).toThrow('Invalid object id in commit: xyz');
  });
});
