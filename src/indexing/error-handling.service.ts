import { Injectable, Logger } from '@nestjs/common';
import { IndexingError } from './errors/indexing.error';

/**
 * Collects the non-fatal errors of an indexing run so callers can report them once the
 * run is complete.
 */
@Injectable()
export class ErrorHandlingService implements Iterable<IndexingError> {
  private readonly logger = new Logger(ErrorHandlingService.name);
  private readonly errors: IndexingError[] = [];

  log(error: IndexingError): void {
    this.logger.error(`${error.name}: ${error.message}`);
    this.errors.push(error);
  }

  hasError(): boolean {
    return this.errors.length > 0;
  }

  count(): number {
    return this.errors.length;
  }

  getErrors(): readonly IndexingError[] {
    return this.errors;
  }

  reset(): void {
    this.errors.length = 0;
  }

  [Symbol.iterator](): Iterator<IndexingError> {
    return this.errors[Symbol.iterator]();
  }
}
