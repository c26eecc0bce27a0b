export const COMMANDS = [
  "start",
  "help",
  "upload",
  "list",
  "details",
  "stats",
  "download",
  "delete",
] as const;

export type CommandName = (typeof COMMANDS)[number];

export interface ParsedCommand {
  command: string;
  args: string;
}

const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?:\s([\s\S]*))?$/;

export function isKnownCommand(command: string): command is CommandName {
  return (COMMANDS as readonly string[]).includes(command);
}

/**
 * Split "/name@bot rest of text" into the command and its raw argument.
 * Whitespace inside the argument is kept as typed.
 * Returns null for plain text and for commands addressed to another bot.
 */
export function parseCommand(
  text: string,
  botUsername?: string,
): ParsedCommand | null {
  const match = COMMAND_PATTERN.exec(text);
  if (!match) {
    return null;
  }

  const [, name, mention, rest] = match;
  if (
    mention !== undefined &&
    botUsername !== undefined &&
    mention.toLowerCase() !== botUsername.toLowerCase()
  ) {
    return null;
  }

  return { command: name.toLowerCase(), args: rest ?? "" };
}
