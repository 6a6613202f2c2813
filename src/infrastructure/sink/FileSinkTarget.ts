import * as fs from 'fs/promises';
import * as path from 'path';
import { SinkTarget } from '../../application/ports/SinkTarget';
import { StdoutSinkTarget } from './StdoutSinkTarget';

/**
 * Writes the result to a file, creating parent directories as needed.
 */
export class FileSinkTarget implements SinkTarget {
  private readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = path.resolve(filePath);
  }

  get description(): string {
    return this.filePath;
  }

  async write(content: string): Promise<void> {
    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, content, 'utf-8');
  }
}

/**
 * `-` or no path means standard output.
 */
export function createSinkTarget(outputPath?: string): SinkTarget {
  if (!outputPath || outputPath === '-') {
    return new StdoutSinkTarget();
  }
  return new FileSinkTarget(outputPath);
}
