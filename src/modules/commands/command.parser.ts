/**
 * COMMANDS — Parser
 */

export interface ParsedCommand {
  /** Lower-cased, without the leading slash */
  name: string;
  /** Bot username from `/cmd@BotName`, as written */
  mention?: string;
  args: string;
}

const COMMAND_RE = /^\/([A-Za-z0-9_]{1,32})(?:@([A-Za-z0-9_]+))?(?:\s+([\s\S]*))?$/;

export function parseCommand(text: string): ParsedCommand | null {
  const match = COMMAND_RE.exec(text.trim());
  if (!match) return null;

  const [, name, mention, args] = match;
  if (!name) return null;

  return {
    name: name.toLowerCase(),
    mention,
    args: args?.trim() ?? '',
  };
}

/**
 * `/cmd@Other` belongs to another bot in the same group. Without a known
 * username every mention is accepted.
 */
export function isAddressedTo(command: ParsedCommand, botUsername: string | undefined): boolean {
  if (!command.mention || !botUsername) return true;
  return command.mention.toLowerCase() === botUsername.toLowerCase();
}
