export interface OperatorPort {
  /** Rejects with OperatorInputError once the input stream has closed. */
  ask(question: string): Promise<string>;
  say(line: string): void;
  close(): void;
}
