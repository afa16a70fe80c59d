import { ObjectException } from '@/core/exceptions';
import { HashUtils } from '@/utils/helpers/hash';
import { GitObject, ObjectType } from '../base';
import { CommitPerson } from './commit-person';

export type CommitCreateOptions = {
  treeSha: string;
  parentShas?: string[];
  author: CommitPerson;
  committer: CommitPerson;
  message: string;
};

/**
 * Git Commit Object Implementation
 *
 * Commit Object Structure:
 * ┌─────────────────────────────────────────────────────────────────┐
 * │ "tree" SPACE tree-sha LF                                        │
 * │ "parent" SPACE parent-sha LF (zero or more)                     │
 * │ "author" SPACE name SPACE email SPACE timestamp SPACE tz LF     │
 * │ "committer" SPACE name SPACE email SPACE timestamp SPACE tz LF  │
 * │ other headers (encoding, gpgsig, mergetag...) LF                │
 * │ LF                                                              │
 * │ commit-message                                                  │
 * └─────────────────────────────────────────────────────────────────┘
 *
 * Continuation lines of multi-line headers such as `gpgsig` start with a space.
 * A parsed commit keeps its original bytes so that its id never changes.
 */
export class CommitObject extends GitObject {
  private readonly _treeSha: string;
  private readonly _parentShas: string[];
  private readonly _author: CommitPerson;
  private readonly _committer: CommitPerson;
  private readonly _message: string;
  private readonly _raw: Uint8Array | null;

  constructor(commit: CommitCreateOptions, raw: Uint8Array | null = null) {
    super();
    this._treeSha = CommitObject.validateSha(commit.treeSha);
    this._parentShas = (commit.parentShas ?? []).map((p) => CommitObject.validateSha(p));
    this._author = commit.author;
    this._committer = commit.committer;
    this._message = commit.message;
    this._raw = raw;
  }

  override type(): ObjectType {
    return ObjectType.COMMIT;
  }

  override content(): Uint8Array {
    return this._raw ?? this.serializeContent();
  }

  get treeSha(): string {
    return this._treeSha;
  }

  get parentShas(): readonly string[] {
    return this._parentShas;
  }

  get author(): CommitPerson {
    return this._author;
  }

  get committer(): CommitPerson {
    return this._committer;
  }

  get message(): string {
    return this._message;
  }

  private serializeContent(): Uint8Array {
    const lines = [`tree ${this._treeSha}\n`];
    for (const parentSha of this._parentShas) {
      lines.push(`parent ${parentSha}\n`);
    }
    lines.push(`author ${this._author.formatForGit()}\n`);
    lines.push(`committer ${this._committer.formatForGit()}\n`);
    lines.push('\n');
    lines.push(this._message);
    return new TextEncoder().encode(lines.join(''));
  }

  static fromContent(content: Uint8Array): CommitObject {
    const text = Buffer.from(content.buffer, content.byteOffset, content.byteLength).toString('utf8');
    const separator = text.indexOf('\n\n');
    const headerText = separator === -1 ? text : text.substring(0, separator);
    const message = separator === -1 ? '' : text.substring(separator + 2);

    let treeSha: string | null = null;
    const parentShas: string[] = [];
    let author: CommitPerson | null = null;
    let committer: CommitPerson | null = null;

    for (const line of headerText.split('\n')) {
      if (line.startsWith(' ')) continue;
      const space = line.indexOf(' ');
      const key = space === -1 ? line : line.substring(0, space);
      const value = space === -1 ? '' : line.substring(space + 1);

      switch (key) {
        case 'tree':
          if (treeSha !== null) throw new ObjectException('Multiple tree entries found');
          treeSha = value;
          break;
        case 'parent':
          parentShas.push(value);
          break;
        case 'author':
          author = CommitPerson.parseFromGit(value);
          break;
        case 'committer':
          committer = CommitPerson.parseFromGit(value);
          break;
        default:
          break;
      }
    }

    if (treeSha === null) throw new ObjectException('Tree SHA is required');
    if (author === null) throw new ObjectException('Author is required');
    if (committer === null) throw new ObjectException('Committer is required');

    return new CommitObject({ treeSha, parentShas, author, committer, message }, content);
  }

  private static validateSha(sha: string): string {
    if (!HashUtils.isObjectId(sha)) {
      throw new ObjectException(`Invalid object id in commit: ${sha}`);
    }
    return sha;
  }
}
