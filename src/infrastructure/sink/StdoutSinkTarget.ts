import { Writable } from 'stream';
import { SinkTarget } from '../../application/ports/SinkTarget';

/**
 * Writes the result to standard output (or any writable stream).
 */
export class StdoutSinkTarget implements SinkTarget {
  readonly description = 'stdout';

  constructor(private readonly stream: Writable = process.stdout) {}

  write(content: string): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.stream.write(content, 'utf-8', error => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
