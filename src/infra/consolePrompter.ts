import * as readline from "readline";
import { Prompter } from "../cli/interactiveLoop";

export class ConsolePrompter implements Prompter {
  private readonly rl: readline.Interface;
  private readonly lines: AsyncIterator<string>;

  constructor(input: NodeJS.ReadableStream = process.stdin, private output: NodeJS.WritableStream = process.stdout) {
    this.rl = readline.createInterface({ input, terminal: false });
    this.lines = this.rl[Symbol.asyncIterator]();
  }

  // resolves null once the input stream has ended
  async ask(question: string): Promise<string | null> {
    this.output.write(question);
    const next = await this.lines.next();
    return next.done ? null : next.value;
  }

  print(line: string): void {
    this.output.write(`${line}\n`);
  }

  close(): void {
    this.rl.close();
  }
}
