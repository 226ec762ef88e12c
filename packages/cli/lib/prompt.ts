/**
 * Line prompts for collecting card fields.
 *
 * A real TTY gets @inquirer/prompts. Piped stdin (scripts, tests) falls
 * back to a plain line reader, since inquirer expects a terminal.
 */

import { input } from "@inquirer/prompts";
import { createInterface, type Interface } from "node:readline";

export interface Prompter {
  /** Ask one question; resolves to "" once input is exhausted. */
  ask(message: string): Promise<string>;
  close(): void;
}

class InquirerPrompter implements Prompter {
  async ask(message: string): Promise<string> {
    return await input({ message });
  }

  close(): void {}
}

/**
 * Reads one line per question. The readline interface is opened on the
 * first question so that a run with every field given never touches stdin.
 */
export class LinePrompter implements Prompter {
  private readonly input: NodeJS.ReadableStream;
  private readonly output: NodeJS.WritableStream;
  private rl: Interface | null = null;
  private lines: AsyncIterator<string> | null = null;

  constructor(input: NodeJS.ReadableStream, output: NodeJS.WritableStream) {
    this.input = input;
    this.output = output;
  }

  async ask(message: string): Promise<string> {
    if (!this.lines) {
      this.rl = createInterface({ input: this.input, terminal: false });
      this.lines = this.rl[Symbol.asyncIterator]();
    }

    this.output.write(`${message} `);
    const next = await this.lines.next();
    this.output.write("\n");
    return next.done ? "" : next.value;
  }

  close(): void {
    this.rl?.close();
    this.rl = null;
    this.lines = null;
  }
}

export interface PrompterOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Use terminal prompts. Default: whether stdin is a TTY. */
  interactive?: boolean;
}

export function createPrompter(options: PrompterOptions = {}): Prompter {
  const interactive = options.interactive ?? process.stdin.isTTY === true;
  if (interactive) return new InquirerPrompter();
  return new LinePrompter(
    options.input ?? process.stdin,
    options.output ?? process.stdout,
  );
}
