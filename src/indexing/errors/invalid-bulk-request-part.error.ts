/**
 * Something other than a BulkRequestPart ended up in the bulk buffer.
 */
export class InvalidBulkRequestPartError extends Error {
  constructor(value: unknown) {
    super(`Invalid bulk request part of type ${value === null ? 'null' : typeof value}`);
    this.name = 'InvalidBulkRequestPartError';
    Object.setPrototypeOf(this, InvalidBulkRequestPartError.prototype);
  }
}
