import { Readable, Writable } from 'node:stream';

export function inputOf(text: string): Readable {
  return Readable.from([Buffer.from(text)]);
}

/** A readable that errors on first read. */
export function brokenInput(message: string): Readable {
  return new Readable({
    read() {
      this.destroy(new Error(message));
    },
  });
}

/** Collects everything written to it. */
export class MemoryWritable extends Writable {
  private readonly chunks: Buffer[] = [];

  override _write(chunk: Buffer | string, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
    callback();
  }

  get text(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }

  lines(): string[] {
    return this.text.split('\n').filter((line) => line !== '');
  }
}
