import { SinkTarget } from '../../src/application/ports/SinkTarget';

/**
 * Sink target that keeps every write in memory, or fails each one.
 */
export class MemorySinkTarget implements SinkTarget {
  readonly description = 'memory';
  readonly writes: string[] = [];

  constructor(private readonly failWith: Error | null = null) {}

  async write(content: string): Promise<void> {
    if (this.failWith) {
      throw this.failWith;
    }
    this.writes.push(content);
  }

  /** The single written document, parsed. */
  get parsed(): unknown {
    if (this.writes.length !== 1) {
      throw new Error(`expected exactly one write, got ${this.writes.length}`);
    }
    return JSON.parse(this.writes[0]);
  }
}
