import { BulkRequestPart } from './bulk-request-part';

/**
 * Bulk buffer of one flush cycle. Parts keep their append order.
 */
export class IndexingSession {
  private parts: BulkRequestPart[] = [];
  private bulkProcessing = false;

  append(part: BulkRequestPart): void {
    this.parts.push(part);
  }

  getParts(): readonly BulkRequestPart[] {
    return this.parts;
  }

  /**
   * Number of buffered parts
   */
  get length(): number {
    return this.parts.length;
  }

  /**
   * Buffered payload in bytes
   */
  get size(): number {
    return this.parts.reduce((sum, part) => sum + part.getSize(), 0);
  }

  isEmpty(): boolean {
    return this.parts.length === 0;
  }

  /**
   * Drops every part the predicate matches
   */
  discard(predicate: (part: BulkRequestPart) => boolean): void {
    this.parts = this.parts.filter(part => !predicate(part));
  }

  clear(): void {
    this.parts = [];
  }

  isBulkProcessing(): boolean {
    return this.bulkProcessing;
  }

  setBulkProcessing(bulkProcessing: boolean): void {
    this.bulkProcessing = bulkProcessing;
  }
}
