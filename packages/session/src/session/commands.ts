export const COMMAND_PREFIX = "/";

export type Command =
  | { name: "list" }
  | { name: "ping" }
  | { name: "help" }
  | { name: "quit" }
  | { name: "unknown"; word: string };

const ALIASES: Record<string, Command["name"]> = {
  list: "list",
  ping: "ping",
  help: "help",
  h: "help",
  "?": "help",
  quit: "quit",
  exit: "quit",
  q: "quit",
};

/** Returns `null` for lines that are chat text rather than commands. */
export function parseCommand(line: string): Command | null {
  if (!line.startsWith(COMMAND_PREFIX)) {
    return null;
  }
  const word = line.slice(COMMAND_PREFIX.length).trim().split(/\s+/, 1)[0].toLowerCase();
  const name = Object.hasOwn(ALIASES, word) ? ALIASES[word] : undefined;
  switch (name) {
    case "list":
    case "ping":
    case "help":
    case "quit":
      return { name };
    default:
      return { name: "unknown", word };
  }
}
