import type { OutputStream } from '../output/index.js';

/**
 * An output stream that keeps everything written to it.
 */
export class MemoryStream implements OutputStream {
  readonly chunks: string[] = [];

  write(chunk: string): boolean {
    this.chunks.push(chunk);
    return true;
  }

  get text(): string {
    return this.chunks.join('');
  }

  /** Written text split into lines, without the trailing empty line */
  get lines(): string[] {
    const lines = this.text.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();
    return lines;
  }
}
