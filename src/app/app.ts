/**
 * Main Application Class
 * Builds the commander program from the registry and runs one invocation
 */

import { Command, CommanderError } from 'commander';
import type { KeepcConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import type { Formatter, Output } from '../services/output.js';
import type { Prompter } from '../services/prompter.js';
import type { ProcessRunner } from '../services/process-runner.js';
import type { ErrorHandler } from '../services/error-handler.js';
import type { CommandDefinition, CommandRegistry } from '../commands/registry.js';
import { printMatches } from '../commands/handlers.js';
import type { AppContext } from './context.js';

export interface AppDependencies {
  config: KeepcConfig;
  logger: Logger;
  output: Output;
  formatter: Formatter;
  prompter: Prompter;
  runner: ProcessRunner;
  errorHandler: ErrorHandler;
  commandRegistry: CommandRegistry<AppContext>;
}

export const PROGRAM_NAME = 'keepc';

/**
 * Name reported for the free-text search fallback
 */
export const FALLBACK_COMMAND = 'search';

/**
 * First words the program itself answers
 */
const PROGRAM_WORDS = new Set(['help', '-h', '--help']);

/**
 * Flattens commander's processed arguments (strings, variadic arrays, undefined)
 */
export function flattenArgs(values: readonly unknown[]): string[] {
  const words: string[] = [];
  for (const value of values) {
    if (typeof value === 'string') {
      words.push(value);
    } else if (Array.isArray(value)) {
      for (const item of value) {
        if (typeof item === 'string') {
          words.push(item);
        }
      }
    }
  }
  return words;
}

function stripTrailingNewline(text: string): string {
  return text.endsWith('\n') ? text.slice(0, -1) : text;
}

export class KeepcApp {
  private deps: AppDependencies;
  private activeCommand: string | undefined;

  constructor(deps: AppDependencies) {
    this.deps = deps;
  }

  get context(): AppContext {
    const { config, logger, output, formatter, prompter, runner } = this.deps;
    return { config, logger, output, formatter, prompter, runner };
  }

  /**
   * Creates a fresh commander program; one per invocation
   */
  buildProgram(): Command {
    const { output, commandRegistry } = this.deps;
    const ctx = this.context;

    const program = new Command(PROGRAM_NAME)
      .description('Keep and manage useful commands')
      .exitOverride()
      .configureOutput({
        writeOut: (text) => output.line(stripTrailingNewline(text)),
        writeErr: (text) => output.error(stripTrailingNewline(text)),
      });

    for (const definition of commandRegistry.getAllCommands()) {
      this.addSubcommand(program, definition, ctx);
    }

    // Searches never reach commander (see isFallback); bare `keepc` shows help
    program
      .argument('[pattern...]', 'search saved commands when no subcommand matches')
      .action(() => {
        program.help();
      });

    return program;
  }

  private addSubcommand(program: Command, definition: CommandDefinition<AppContext>, ctx: AppContext): void {
    const nameAndArgs = definition.usage ? `${definition.name} ${definition.usage}` : definition.name;
    const sub = program
      .command(nameAndArgs, { hidden: definition.hidden === true })
      .aliases(definition.aliases ?? [])
      .description(definition.description);

    for (const option of definition.options ?? []) {
      sub.option(option.flags, option.description);
    }
    if (definition.acceptsDashWords) {
      sub.allowUnknownOption();
    }

    sub.action(async () => {
      this.activeCommand = definition.name;
      this.deps.logger.debug('Running command', { command: definition.name });
      await definition.handler(ctx, {
        args: flattenArgs(sub.processedArgs),
        options: sub.opts(),
      });
    });
  }

  /**
   * Whether the invocation is a free-text search: the first word is
   * neither a subcommand nor one the program answers. The words are
   * searched as typed, dashes included.
   */
  isFallback(argv: readonly string[]): boolean {
    const first = argv.at(0);
    return first !== undefined
      && !PROGRAM_WORDS.has(first)
      && this.deps.commandRegistry.resolve(first) === undefined;
  }

  /**
   * Runs one invocation and returns the exit code
   * @param argv - arguments after the program name
   */
  async run(argv: string[]): Promise<number> {
    this.activeCommand = undefined;

    try {
      if (this.isFallback(argv)) {
        this.activeCommand = FALLBACK_COMMAND;
        await printMatches(this.context, argv.join(' '));
        return 0;
      }
      await this.buildProgram().parseAsync(argv, { from: 'user' });
      return 0;
    } catch (error) {
      if (error instanceof CommanderError) {
        return error.exitCode;
      }
      return this.deps.errorHandler.handle(error, { command: this.activeCommand });
    } finally {
      this.deps.prompter.close();
    }
  }
}
