import { GitException } from '@/core/exceptions';

export class SyncException extends GitException {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'SyncException';
  }
}

/**
 * A branch or remote name that is not valid UTF-8
 */
export class InvalidNameException extends SyncException {
  constructor(
    readonly what: 'branch' | 'remote',
    readonly rawName: Buffer
  ) {
    super(`invalid ${what} name '${InvalidNameException.escape(rawName)}': not valid UTF-8`);
    this.name = 'InvalidNameException';
  }

  private static escape(bytes: Buffer): string {
    return Array.from(bytes, (byte) =>
      byte >= 0x20 && byte < 0x7f
        ? String.fromCharCode(byte)
        : `\\x${byte.toString(16).padStart(2, '0')}`
    ).join('');
  }
}

export class NoCurrentBranchException extends SyncException {
  constructor() {
    super('no current branch');
    this.name = 'NoCurrentBranchException';
  }
}

export class NoRemoteException extends SyncException {
  constructor(remote?: string) {
    super(
      remote === undefined
        ? 'no remote for current branch'
        : `no remote for current branch: '${remote}' is not a configured remote`
    );
    this.name = 'NoRemoteException';
  }
}

export class FetchException extends SyncException {
  constructor(remote: string, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`failed to fetch '${remote}': ${reason}`, cause);
    this.name = 'FetchException';
  }
}
