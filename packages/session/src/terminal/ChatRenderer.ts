import { Chalk, type ChalkInstance } from "chalk";

import type { Terminal } from "./Terminal.js";

export const CLEAR_LINE = "\x1b[2K\r";
export const ERASE_PREVIOUS_LINE = "\x1b[1A\x1b[2K\r";

export const HELP_TEXT = `Available commands:
/help           Show this help
/quit           Leave the chat
/list           Show peers currently in the room
/ping           Measure round-trip latency to all peers`;

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Every method issues its whole clear/write/redraw sequence synchronously, so
 * output from the receiver and the sender can never interleave.
 */
export class ChatRenderer {
  private readonly chalk: ChalkInstance;

  constructor(
    private readonly terminal: Terminal,
    options: { chalk?: ChalkInstance; colors?: boolean } = {},
  ) {
    this.chalk = options.chalk ?? (options.colors === false ? new Chalk({ level: 0 }) : new Chalk());
  }

  chat(nick: string, text: string, deliveredAt: Date): void {
    const body = text.replaceAll("\n", "\n» ");
    this.print(`> [${formatTimestamp(deliveredAt)}] [${this.chalk.green(nick)}]\n» ${body}\n\n`);
  }

  joined(nick: string): void {
    this.notice(this.chalk.bold.green(`*** ${nick} joined the chat ***`));
  }

  latency(nick: string, elapsedMs: number): void {
    this.notice(this.chalk.cyan(`Pong from ${nick}: ${Math.round(elapsedMs)} ms`));
  }

  peers(peers: string[]): void {
    this.notice(`Peers (${peers.length}): ${peers.join(", ")}`);
  }

  help(): void {
    this.notice(HELP_TEXT);
  }

  unknownCommand(word: string): void {
    this.notice(`Unknown command: /${word}`);
  }

  notice(text: string): void {
    this.print(`${text}\n`);
  }

  farewell(): void {
    this.terminal.write(`${CLEAR_LINE}Bye!\n`);
  }

  /** Removes the line the user just submitted; their message comes back through the channel. */
  eraseSubmittedLine(): void {
    this.terminal.write(ERASE_PREVIOUS_LINE);
  }

  private print(block: string): void {
    this.terminal.write(`${CLEAR_LINE}${block}`);
    this.terminal.redrawPrompt();
  }
}
