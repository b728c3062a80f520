import { createInterface, Interface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { IConsoleIO } from './IConsoleIO.js';

// line reader over stdin/stdout; works for terminals and piped input alike
export class ReadlineConsole implements IConsoleIO {
  private readonly rl: Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(
    input: Readable = process.stdin,
    private readonly output: Writable = process.stdout
  ) {
    this.rl = createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  async prompt(question: string): Promise<string | null> {
    this.output.write(question);
    const next = await this.lines.next();
    if (next.done) return null;
    return next.value;
  }

  print(line: string = ''): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.rl.close();
  }
}
