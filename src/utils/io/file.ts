import { promises as fs, type Stats } from 'fs';

/**
 * Utility class for file operations.
 */
export class FileUtils {
  /**
   * Creates directories for the given path if they do not exist.
   */
  public static async createDirectories(path: string): Promise<void> {
    await fs.mkdir(path, { recursive: true });
  }

  /**
   * Reads a file, or returns null when it does not exist.
   */
  public static async readFileIfExists(path: string | Buffer): Promise<Buffer | null> {
    try {
      return await fs.readFile(path);
    } catch (error) {
      if (FileUtils.isNotFound(error)) return null;
      throw error;
    }
  }

  /**
   * Stats a path, or returns null when it does not exist.
   */
  public static async statIfExists(path: string): Promise<Stats | null> {
    try {
      return await fs.stat(path);
    } catch (error) {
      if (FileUtils.isNotFound(error)) return null;
      throw error;
    }
  }

  /**
   * Checks if a file exists at the given path.
   */
  public static async exists(path: string): Promise<boolean> {
    return (await FileUtils.statIfExists(path)) !== null;
  }

  public static errorCode(error: unknown): string | undefined {
    if (typeof error !== 'object' || error === null || !('code' in error)) return undefined;
    return typeof error.code === 'string' ? error.code : undefined;
  }

  public static isNotFound(error: unknown): boolean {
    const code = FileUtils.errorCode(error);
    return code === 'ENOENT' || code === 'ENOTDIR';
  }
}
