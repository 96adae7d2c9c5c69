import * as readline from "readline";
import type { Highlight } from "../core/protocol/reply";
import type { PresentationPort } from "../ports";

export interface ConsolePresentationOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
}

/**
 * Presentation on a terminal: info and messages are printed, choices are a numbered menu.
 */
export class ConsolePresentation implements PresentationPort {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;

  constructor(options: ConsolePresentationOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  showInfo(text: string, _highlights: Highlight[]): void {
    this.output.write(`${text}\n`);
  }

  message(text: string): void {
    this.output.write(`${text}\n`);
  }

  offerChoices(title: string, choices: string[]): Promise<string | undefined> {
    this.output.write(`${title}\n`);
    choices.forEach((choice, i) => {
      this.output.write(`  ${i + 1}) ${choice}\n`);
    });

    const rl = readline.createInterface({ input: this.input, output: this.output, terminal: false });
    return new Promise((resolve) => {
      let answered = false;
      rl.question("choice> ", (answer) => {
        answered = true;
        rl.close();
        resolve(pickChoice(answer, choices));
      });
      // End of input dismisses the menu.
      rl.once("close", () => {
        if (!answered) resolve(undefined);
      });
    });
  }
}

/**
 * Accept a 1-based index or an exact entry; anything else dismisses.
 */
export function pickChoice(answer: string, choices: string[]): string | undefined {
  const trimmed = answer.trim();
  if (/^\d+$/.test(trimmed)) return choices[parseInt(trimmed, 10) - 1];
  return choices.find((c) => c === trimmed);
}
