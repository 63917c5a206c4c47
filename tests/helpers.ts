import { Logger } from "winston";
import { Selection } from "../src/models/selection";
import { SelectionInput } from "../src/dtos/selection.dto";
import { createLogger } from "../src/infra/logger";
import { Prompter } from "../src/cli/interactiveLoop";

export function selectionOf(input: SelectionInput): Selection {
  const result = Selection.create(input);
  if (!result.ok) throw result.error;
  return result.value;
}

export function silentLogger(): Logger {
  return createLogger({ nodeEnv: 'test', logLevel: 'debug' });
}

// Replays canned answers, then reports end of input.
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  readonly printed: string[] = [];

  constructor(private answers: string[]) {}

  async ask(question: string): Promise<string | null> {
    this.questions.push(question);
    return this.answers.shift() ?? null;
  }

  print(line: string): void {
    this.printed.push(line);
  }
}
