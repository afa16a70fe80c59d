/**
 * Builders for the reference names the tool touches.
 */
export class RefNames {
  public static readonly HEAD = 'HEAD' as const;
  public static readonly HEADS_PREFIX = 'refs/heads/' as const;
  public static readonly REMOTES_PREFIX = 'refs/remotes/' as const;
  public static readonly REMOTE_HEAD = 'HEAD' as const;

  private constructor() {}

  static branch(name: string): string {
    return `${RefNames.HEADS_PREFIX}${name}`;
  }

  static remotePrefix(remote: string): string {
    return `${RefNames.REMOTES_PREFIX}${remote}/`;
  }

  static remoteTracking(remote: string, branch: string): string {
    return `${RefNames.remotePrefix(remote)}${branch}`;
  }

  static remoteHead(remote: string): string {
    return RefNames.remoteTracking(remote, RefNames.REMOTE_HEAD);
  }

  /**
   * `name` without `prefix`, or null when it does not start with it.
   */
  static stripPrefix(name: Buffer, prefix: string): Buffer | null {
    const prefixBytes = Buffer.from(prefix);
    if (name.length <= prefixBytes.length) return null;
    if (!name.subarray(0, prefixBytes.length).equals(prefixBytes)) return null;
    return name.subarray(prefixBytes.length);
  }
}
