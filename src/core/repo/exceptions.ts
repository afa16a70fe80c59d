import { GitException } from '../exceptions';

export class RepositoryException extends GitException {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'RepositoryException';
  }
}

export class RepositoryNotFoundException extends RepositoryException {
  constructor(startPath: string) {
    super(`not a git repository (or any of the parent directories): ${startPath}`);
    this.name = 'RepositoryNotFoundException';
  }
}
