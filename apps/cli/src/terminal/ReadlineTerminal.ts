import { createInterface, type Interface } from "node:readline";

import { AsyncQueue, TerminalClosedError, TerminalInterruptError, type Terminal } from "@peerchat/session";

type TerminalEvent = { type: "line"; line: string } | { type: "interrupt" };

export type ReadlineTerminalOptions = {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  prompt?: string;
  /** Defaults to whether `output` is a TTY. */
  terminal?: boolean;
};

/**
 * Terminal over `node:readline`. Lines typed while nothing is reading are
 * buffered; Ctrl-C discards the half-typed line and surfaces as
 * `TerminalInterruptError`.
 */
export class ReadlineTerminal implements Terminal {
  readonly prompt: string;
  private readonly rl: Interface;
  private readonly output: NodeJS.WritableStream;
  private readonly events = new AsyncQueue<TerminalEvent>();
  private reading = false;

  constructor(options: ReadlineTerminalOptions) {
    this.prompt = options.prompt ?? "> ";
    this.output = options.output;
    this.rl = createInterface({
      input: options.input,
      output: options.output,
      prompt: this.prompt,
      terminal: options.terminal ?? isTty(options.output),
    });
    this.rl.on("line", (line: string) => {
      this.events.push({ type: "line", line });
    });
    this.rl.on("SIGINT", () => {
      this.interrupt();
    });
    this.rl.on("close", () => {
      this.events.close(new TerminalClosedError());
    });
  }

  async readLine(signal: AbortSignal): Promise<string> {
    this.reading = true;
    this.rl.prompt();
    try {
      const event = await this.events.next(signal);
      if (event.type === "interrupt") {
        this.output.write("\n");
        throw new TerminalInterruptError();
      }
      return event.line;
    } finally {
      this.reading = false;
    }
  }

  write(text: string): void {
    this.output.write(text);
  }

  redrawPrompt(): void {
    if (this.reading) {
      this.rl.prompt(true);
    }
  }

  /** Discards the half-typed line; a pending read rejects with an interrupt. */
  interrupt(): void {
    this.discardLine();
    if (this.reading) {
      this.events.push({ type: "interrupt" });
    }
  }

  close(): void {
    this.rl.close();
  }

  private discardLine(): void {
    if (!this.rl.terminal) {
      return;
    }
    this.rl.write(null, { ctrl: true, name: "e" });
    this.rl.write(null, { ctrl: true, name: "u" });
  }
}

function isTty(stream: NodeJS.WritableStream): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}
