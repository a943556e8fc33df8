/**
 * Destination for rendered text. A `write` that throws aborts whatever is
 * being rendered and the error reaches the caller unchanged.
 */
export interface TocSink {
  write(chunk: string): void;
}

/**
 * Collects everything written into memory.
 */
export class StringSink implements TocSink {
  private readonly chunks: string[] = [];

  write(chunk: string): void {
    this.chunks.push(chunk);
  }

  toString(): string {
    return this.chunks.join('');
  }
}
