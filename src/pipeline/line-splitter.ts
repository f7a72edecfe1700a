import { StringDecoder } from 'node:string_decoder';

const NEWLINE = /\r?\n/;

/**
 * Turns a byte stream of process output into text lines.
 * Chunks are decoded as UTF-8 across boundaries, so a character split between
 * two chunks arrives whole. The text after the last newline is held until end().
 */
export class LineSplitter {
  private readonly decoder = new StringDecoder('utf8');
  private pending = '';

  constructor(private readonly onLine: (line: string) => void) {}

  push(chunk: Buffer): void {
    this.emit(this.pending + this.decoder.write(chunk));
  }

  end(): void {
    const tail = this.pending + this.decoder.end();
    this.pending = '';
    if (tail) this.onLine(tail);
  }

  private emit(text: string): void {
    const lines = text.split(NEWLINE);
    this.pending = lines.pop() ?? '';
    lines.forEach((line) => this.onLine(line));
  }
}
