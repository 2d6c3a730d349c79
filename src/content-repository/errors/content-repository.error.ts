/**
 * Raised when content repository data is inconsistent, e.g. an undefined node type.
 */
export class ContentRepositoryError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ContentRepositoryError';
    Object.setPrototypeOf(this, ContentRepositoryError.prototype);
  }
}
