import { GitException } from '@/core/exceptions';

/**
 * The remote could not be reached, refused us, or sent something unusable.
 */
export class TransportException extends GitException {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = 'TransportException';
  }
}
