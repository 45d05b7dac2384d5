/**
 * Command Registry
 * Provides subcommand registration, validation and alias resolution
 */

/**
 * Positional words and parsed flags handed to a handler
 */
export interface CommandInput {
  args: string[];
  options: Record<string, unknown>;
}

export type CommandHandler<T> = (ctx: T, input: CommandInput) => Promise<void>;

export interface OptionDefinition {
  flags: string;
  description: string;
}

export interface CommandDefinition<T> {
  name: string;
  aliases?: string[];
  description: string;
  /** Positional argument syntax, e.g. `<pattern...>` */
  usage?: string;
  options?: OptionDefinition[];
  /** Pass words starting with a dash (`-la`) through as arguments */
  acceptsDashWords?: boolean;
  handler: CommandHandler<T>;
  hidden?: boolean; // If true, command won't appear in help but still works
}

export interface CommandRegistry<T> {
  register(command: CommandDefinition<T>): void;
  unregister(commandName: string): void;
  resolve(nameOrAlias: string): CommandDefinition<T> | undefined;
  getAllCommands(): CommandDefinition<T>[];
  validateCommandName(name: string): boolean;
}

export class CommandValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CommandValidationError';
  }
}


/**
 * Command name validation pattern
 * Subcommand names and aliases must:
 * - Start with a lowercase letter
 * - Contain only lowercase letters, digits, and dashes
 * - Be 1-32 characters long
 */
const COMMAND_NAME_PATTERN = /^[a-z][a-z0-9-]{0,31}$/;

/**
 * Names the command-line layer already claims
 */
const RESERVED_NAMES = new Set(['help']);

export function validateCommandName(name: string): boolean {
  return COMMAND_NAME_PATTERN.test(name) && !RESERVED_NAMES.has(name);
}

export class CommandRegistryImpl<T> implements CommandRegistry<T> {
  private commands: Map<string, CommandDefinition<T>> = new Map();
  private aliases: Map<string, string> = new Map();

  /**
   * Register a command with validation
   * Names and aliases share one namespace
   */
  register(command: CommandDefinition<T>): void {
    const names = [command.name, ...(command.aliases ?? [])];

    for (const name of names) {
      if (!this.validateCommandName(name)) {
        throw new CommandValidationError(
          `Invalid command name "${name}". Command names must start with a lowercase letter, ` +
          `contain only lowercase letters, digits, and dashes, be 1-32 characters long, and not be reserved.`
        );
      }
    }

    if (new Set(names).size !== names.length) {
      throw new CommandValidationError(`Command "${command.name}" lists the same name twice`);
    }

    for (const name of names) {
      const owner = this.resolve(name);
      if (owner && owner.name !== command.name) {
        throw new CommandValidationError(`"${name}" is already used by command "${owner.name}"`);
      }
    }

    this.unregister(command.name);
    this.commands.set(command.name, command);
    for (const alias of command.aliases ?? []) {
      this.aliases.set(alias, command.name);
    }
  }

  unregister(commandName: string): void {
    const existing = this.commands.get(commandName);
    if (!existing) {
      return;
    }
    for (const alias of existing.aliases ?? []) {
      this.aliases.delete(alias);
    }
    this.commands.delete(commandName);
  }

  /**
   * Look a command up by its name or any of its aliases
   */
  resolve(nameOrAlias: string): CommandDefinition<T> | undefined {
    const name = this.aliases.get(nameOrAlias) ?? nameOrAlias;
    return this.commands.get(name);
  }

  getAllCommands(): CommandDefinition<T>[] {
    return Array.from(this.commands.values());
  }

  validateCommandName(name: string): boolean {
    return validateCommandName(name);
  }
}

export function createCommandRegistry<T>(): CommandRegistry<T> {
  return new CommandRegistryImpl<T>();
}
