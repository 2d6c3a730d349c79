/**
 * Raised when an operation is called in a state it cannot work in, e.g. swapping an
 * alias onto the alias name itself. The code identifies the failed check.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    readonly code: number,
  ) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}
