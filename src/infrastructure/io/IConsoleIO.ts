export interface IConsoleIO {
  // resolves null once input is exhausted
  prompt(question: string): Promise<string | null>;
  print(line?: string): void;
  close(): void;
}
