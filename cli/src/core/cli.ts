/**
 * CLI Interface — interactive readline shell.
 *
 * Lines are tokenized and dispatched through `runCommand` one at a time, in
 * the order typed. Command errors go to the error stream. Reminder
 * notifications arriving while the prompt is idle are printed above it and
 * the prompt is redrawn.
 */

import readline from "readline";
import { describeError } from "./errors.js";
import { runCommand, type CommandContext, type CommandOutcome, type CommandOutput } from "./commands.js";
import { tokenize } from "./tokenize.js";

const PROMPT = "taskminder> ";

export interface ShellOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Where command errors go (default: stderr) */
  errorOutput?: NodeJS.WritableStream;
  /** Everything a command needs except the output and prompt, which the shell supplies */
  context: Omit<CommandContext, "output" | "prompt">;
}

export class Shell {
  private readonly rl: readline.Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly errorOutput: NodeJS.WritableStream;
  private readonly context: CommandContext;
  /** Serializes command execution */
  private queue: Promise<void> = Promise.resolve();
  private looping = false;
  /** A command from the prompt is running; its lines need no prompt redraw */
  private busy = false;
  private closed = false;

  constructor(options: ShellOptions) {
    this.output = options.output ?? process.stdout;
    this.errorOutput = options.errorOutput ?? process.stderr;
    this.rl = readline.createInterface({
      input: options.input ?? process.stdin,
      output: this.output,
      prompt: PROMPT,
    });

    const commandOutput: CommandOutput = {
      info: line => this.print(line),
      error: line => this.write(this.errorOutput, line),
    };
    this.context = {
      ...options.context,
      output: commandOutput,
      prompt: question => this.ask(question),
    };
  }

  /** Run the prompt loop. Resolves when the user quits or input ends. */
  run(): Promise<void> {
    return new Promise(resolve => {
      this.looping = true;
      this.rl.on("line", line => {
        this.queue = this.queue.then(() => this.handleLine(line));
      });
      this.rl.on("close", () => {
        this.closed = true;
        // Let a command that is still running finish first
        this.queue.then(resolve, resolve);
      });
      this.rl.prompt();
    });
  }

  /** Print a line without mangling a half-typed command. */
  print(line: string): void {
    this.write(this.output, line);
  }

  /** Run one command outside the prompt loop (the process command line). */
  execute(argv: string[]): Promise<CommandOutcome> {
    return runCommand(argv, this.context);
  }

  ask(question: string): Promise<string> {
    return new Promise(resolve => this.rl.question(question, resolve));
  }

  close(): void {
    if (!this.closed) this.rl.close();
  }

  private async handleLine(line: string): Promise<void> {
    if (this.closed) return;

    let argv: string[];
    try {
      argv = tokenize(line);
    } catch (error) {
      this.write(this.errorOutput, `Error: ${describeError(error, "Could not read that line")}`);
      return;
    }

    if (argv.length === 0) {
      this.rl.prompt();
      return;
    }

    this.busy = true;
    try {
      const outcome = await runCommand(argv, this.context);
      if (outcome === "quit") {
        this.print("Goodbye!");
        this.close();
        return;
      }
    } finally {
      this.busy = false;
    }
    this.rl.prompt();
  }

  private write(stream: NodeJS.WritableStream, line: string): void {
    const promptShowing = this.looping && !this.closed && !this.busy;
    if (promptShowing && isTTY(this.output)) {
      readline.clearLine(this.output, 0);
      readline.cursorTo(this.output, 0);
    }
    stream.write(`${line}\n`);
    if (promptShowing) this.rl.prompt(true);
  }
}

function isTTY(stream: NodeJS.WritableStream): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}
