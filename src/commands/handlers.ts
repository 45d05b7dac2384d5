/**
 * Built-in subcommands
 */

import type { CommandDefinition, CommandInput } from './registry.js';
import { openStore, persistStore, operationIo, type AppContext } from '../app/context.js';
import { matchCommands } from '../services/search.js';
import {
  bulkEdit,
  createCommand,
  deleteCommand,
  executeCommand,
  notFoundMessage,
} from '../services/operations.js';

function patternOf(input: CommandInput): string {
  return input.args.join(' ');
}

/**
 * Prints the entries matching a pattern, or the not-found line
 */
export async function printMatches(ctx: AppContext, pattern: string): Promise<void> {
  const store = openStore(ctx);
  const matches = matchCommands(pattern, store);

  if (matches.length === 0) {
    ctx.output.line(notFoundMessage(pattern));
    return;
  }
  for (const command of matches) {
    ctx.output.line(ctx.formatter.entry(command, store.get(command) ?? ''));
  }
}

export const newCommand: CommandDefinition<AppContext> = {
  name: 'new',
  aliases: ['add'],
  description: 'Add a new command',
  usage: '[command] [description]',
  handler: async (ctx, { args }) => {
    const store = openStore(ctx);
    const command = await createCommand(store, { command: args.at(0), description: args.at(1) }, ctx.prompter);
    persistStore(ctx, store);
    ctx.logger.info('Command saved', { command });
  },
};

export const listCommand: CommandDefinition<AppContext> = {
  name: 'list',
  aliases: ['ls'],
  description: 'List all saved commands',
  handler: async (ctx) => {
    const store = openStore(ctx);

    if (store.isEmpty()) {
      ctx.output.line('No commands saved.');
      return;
    }
    for (const { command, description } of store.entries()) {
      ctx.output.line(ctx.formatter.entry(command, description));
    }
  },
};

export const grepCommand: CommandDefinition<AppContext> = {
  name: 'grep',
  aliases: ['find', 'search'],
  description: 'Search for commands matching a pattern',
  usage: '<pattern...>',
  acceptsDashWords: true,
  handler: async (ctx, input) => {
    await printMatches(ctx, patternOf(input));
  },
};

export const removeCommand: CommandDefinition<AppContext> = {
  name: 'remove',
  aliases: ['rm', 'delete'],
  description: 'Delete a saved command',
  usage: '<pattern...>',
  acceptsDashWords: true,
  handler: async (ctx, input) => {
    const store = openStore(ctx);
    const removed = await deleteCommand(store, patternOf(input), operationIo(ctx));
    if (removed !== null) {
      persistStore(ctx, store);
    }
  },
};

export const editCommand: CommandDefinition<AppContext> = {
  name: 'edit',
  description: 'Edit commands in a text editor',
  handler: async (ctx) => {
    const store = openStore(ctx);
    const edited = await bulkEdit(store, {
      editor: ctx.config.editor.command,
      runner: ctx.runner,
      logger: ctx.logger,
    });
    persistStore(ctx, edited);
    ctx.output.line('Commands updated.');
  },
};

export const runCommand: CommandDefinition<AppContext> = {
  name: 'run',
  aliases: ['execute'],
  description: 'Execute a saved command',
  usage: '<pattern...>',
  acceptsDashWords: true,
  options: [{ flags: '-e, --exact', description: 'run the command whose text equals the pattern' }],
  handler: async (ctx, input) => {
    const store = openStore(ctx);
    await executeCommand(
      store,
      patternOf(input),
      operationIo(ctx),
      { runner: ctx.runner, shell: ctx.config.shell },
      { exact: input.options.exact === true }
    );
  },
};

export const builtinCommands: CommandDefinition<AppContext>[] = [
  newCommand,
  listCommand,
  grepCommand,
  removeCommand,
  editCommand,
  runCommand,
];
