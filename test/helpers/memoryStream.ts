import { Writable } from 'node:stream';

/**
 * In-process stand-in for stdout/stderr that keeps everything written to it.
 */
export class MemoryStream extends Writable {
  readonly chunks: string[] = [];
  isTTY = false;

  constructor(highWaterMark = 16384) {
    super({ highWaterMark });
  }

  _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(chunk.toString());
    callback();
  }

  get output(): string {
    return this.chunks.join('');
  }
}
