export class GitException extends Error {
  constructor(message: string, cause?: unknown) {
    super(message);
    this.name = 'GitException';
    if (cause !== undefined) this.cause = cause;
  }
}

export class ObjectException extends GitException {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ObjectException';
  }
}

export class RefException extends GitException {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'RefException';
  }
}

/**
 * Another writer holds the `.lock` file of the reference.
 */
export class RefLockedException extends RefException {
  constructor(
    public readonly refName: string,
    lockPath: string
  ) {
    super(`cannot lock ref '${refName}': '${lockPath}' exists`);
    this.name = 'RefLockedException';
  }
}

/**
 * The reference no longer holds the value the caller expected.
 */
export class RefConflictException extends RefException {
  constructor(
    public readonly refName: string,
    public readonly expected: string | null,
    public readonly actual: string | null
  ) {
    super(
      `cannot update ref '${refName}': expected ${expected ?? '(none)'} but found ${actual ?? '(none)'}`
    );
    this.name = 'RefConflictException';
  }
}

export class ConfigException extends GitException {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'ConfigException';
  }
}

/**
 * Local modifications stand in the way of a working tree update.
 */
export class WorkingTreeConflictException extends GitException {
  constructor(public readonly paths: string[]) {
    super(
      `your local changes to the following files would be overwritten: ${paths.join(', ')}`
    );
    this.name = 'WorkingTreeConflictException';
  }
}

export class IndexLockedException extends GitException {
  constructor(lockPath: string) {
    super(`unable to create '${lockPath}': file exists`);
    this.name = 'IndexLockedException';
  }
}
