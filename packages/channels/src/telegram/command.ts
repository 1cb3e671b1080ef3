const COMMAND_PATTERN = /^\/([A-Za-z0-9_]+)(?:@([A-Za-z0-9_]+))?(?=\s|$)/;

/**
 * Command name (lower-cased) at the start of `text`, if any. A `/cmd@name`
 * suffix only counts when it names this bot.
 */
export function parseCommand(text: string, botUsername?: string): string | undefined {
  const match = COMMAND_PATTERN.exec(text);
  if (!match) return undefined;
  const [, name, mention] = match;
  if (mention && botUsername && mention.toLowerCase() !== botUsername.toLowerCase()) {
    return undefined;
  }
  return name.toLowerCase();
}
