/**
 * Storage could not be opened or initialized. The only fatal error of the
 * persistence worker.
 */
export class StorageUnavailableError extends Error {
  constructor(message: string, cause?: Error) {
    super(message, { cause });
    this.name = 'StorageUnavailableError';
    Object.setPrototypeOf(this, StorageUnavailableError.prototype);
  }
}

export default StorageUnavailableError;
