import { Repository } from './repo';
import { GitRepository, type RepositoryOptions } from './git-repository';
import { RepositoryException, RepositoryNotFoundException } from './exceptions';
import { ObjectReader } from './object-reader';

export {
  Repository,
  GitRepository,
  RepositoryException,
  RepositoryNotFoundException,
  ObjectReader,
};
export type { RepositoryOptions };
