/**
 * Destination the serialized result is written to.
 */
export interface SinkTarget {
  /** Human-readable description used in errors and logs */
  readonly description: string;
  write(content: string): Promise<void>;
}
