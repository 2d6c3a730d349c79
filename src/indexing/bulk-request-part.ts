/**
 * Encoded bulk API lines of one node operation, tagged with the hash of the dimensions
 * the node was materialized in so a flush can route them to the right index.
 *
 * Lines that cannot be encoded are kept as `null`, the part is then malformed and must
 * not be sent: an action line without its source line corrupts the whole bulk request.
 */
export class BulkRequestPart {
  private readonly request: (string | null)[] = [];
  private readonly encodingErrors: string[] = [];
  private readonly size: number;

  constructor(
    private readonly targetDimensionsHash: string,
    tuple: readonly unknown[],
  ) {
    for (const item of tuple) {
      this.request.push(this.encode(item));
    }
    this.size = this.request.reduce(
      (sum, line) => sum + (line === null ? 0 : Buffer.byteLength(line, 'utf8')),
      0,
    );
  }

  getTargetDimensionsHash(): string {
    return this.targetDimensionsHash;
  }

  getRequest(): readonly (string | null)[] {
    return this.request;
  }

  /**
   * Size of the encoded lines in bytes
   */
  getSize(): number {
    return this.size;
  }

  getEncodingErrors(): readonly string[] {
    return this.encodingErrors;
  }

  isMalformed(): boolean {
    return this.request.includes(null);
  }

  private encode(item: unknown): string | null {
    try {
      const line = JSON.stringify(item);
      if (line === undefined) {
        this.encodingErrors.push(`A value of type ${typeof item} has no JSON representation`);
        return null;
      }
      return line;
    } catch (error) {
      this.encodingErrors.push(error instanceof Error ? error.message : String(error));
      return null;
    }
  }
}
