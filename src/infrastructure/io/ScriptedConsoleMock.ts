import type { IConsoleIO } from './IConsoleIO.js';

// replays canned input lines and records everything written
export class ScriptedConsoleMock implements IConsoleIO {
  private readonly inputs: string[];
  private readonly output: string[] = [];
  private readonly prompts: string[] = [];
  private closed = false;

  constructor(inputs: string[] = []) {
    this.inputs = [...inputs];
  }

  async prompt(question: string): Promise<string | null> {
    this.prompts.push(question);
    if (this.closed) return null;
    return this.inputs.shift() ?? null;
  }

  print(line: string = ''): void {
    this.output.push(line);
  }

  close(): void {
    this.closed = true;
  }

  // Utility methods for testing
  getOutput(): string[] {
    return [...this.output];
  }

  getPrompts(): string[] {
    return [...this.prompts];
  }

  remainingInputs(): number {
    return this.inputs.length;
  }

  isClosed(): boolean {
    return this.closed;
  }
}
