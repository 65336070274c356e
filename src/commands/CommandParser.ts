import type { Command } from '../core/types/commands.js';

// First whitespace-delimited token, then everything after the whitespace run
const COMMAND_PATTERN = /^(\S+)(?:\s+([\s\S]*))?$/;

/**
 * Turns raw chat text into a {@link Command}. A message whose first token is
 * not one of the trigger words is not a command, so `parse` returns null.
 * Trigger matching is exact and case-sensitive.
 */
export class CommandParser {
  private triggers: ReadonlySet<string>;

  constructor(triggerWords: readonly string[]) {
    if (triggerWords.length === 0) {
      throw new Error('CommandParser needs at least one trigger word');
    }
    this.triggers = new Set(triggerWords);
  }

  parse(rawMessageText: string): Command | null {
    const match = COMMAND_PATTERN.exec(rawMessageText.trimStart());
    if (!match) {
      return null;
    }

    const [, token = '', rest = ''] = match;
    if (!this.triggers.has(token)) {
      return null;
    }

    return { name: token, argument: rest.trim() };
  }

  getTriggerWords(): string[] {
    return [...this.triggers];
  }
}

export default CommandParser;
