import { GitRepository, type RepositoryOptions } from '@/core/repo';

/**
 * Discover the repository containing `startPath`, run `body` against it and
 * release its resources afterwards.
 */
export const withRepository = async <T>(
  startPath: string,
  options: RepositoryOptions,
  body: (repository: GitRepository) => Promise<T>
): Promise<T> => {
  const repository = await GitRepository.findRepository(startPath, options);
  try {
    return await body(repository);
  } finally {
    await repository.close();
  }
};
