/**
 * Commands module exports
 * Contains the command registry and the built-in subcommands
 */

export {
  type CommandInput,
  type CommandHandler,
  type CommandDefinition,
  type CommandRegistry,
  type OptionDefinition,
  CommandValidationError,
  validateCommandName,
  CommandRegistryImpl,
  createCommandRegistry,
} from './registry.js';

export {
  newCommand,
  listCommand,
  grepCommand,
  removeCommand,
  editCommand,
  runCommand,
  builtinCommands,
  printMatches,
} from './handlers.js';
