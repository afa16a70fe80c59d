import { isUtf8 } from 'buffer';
import { InvalidNameException } from './exceptions';

/**
 * Branch and remote names arrive as bytes; only valid UTF-8 is accepted.
 */
export class NameValidator {
  private constructor() {}

  static isValid(raw: Uint8Array): boolean {
    return isUtf8(raw);
  }

  /**
   * Text of `raw`, or InvalidNameException naming what it was meant to be
   */
  static decode(raw: Buffer, what: 'branch' | 'remote'): string {
    if (!NameValidator.isValid(raw)) {
      throw new InvalidNameException(what, raw);
    }
    return raw.toString('utf8');
  }
}
