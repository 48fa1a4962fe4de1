import { errorMessage } from '../utils/errors';

/**
 * Error raised when a module found during discovery cannot be loaded.
 */
export class DiscoveryError extends Error {
  constructor(
    public readonly modulePath: string,
    cause: unknown
  ) {
    super(`Failed to load module ${modulePath}: ${errorMessage(cause)}`, { cause });
    this.name = 'DiscoveryError';
    Object.setPrototypeOf(this, DiscoveryError.prototype);
  }
}
