/**
 * App Factory
 * Creates and configures the application with all dependencies
 */

import { loadConfigFromEnv, validateConfig, type KeepcConfig } from '../core/config.js';
import { createLogger, type Logger } from '../core/logger.js';
import { createConsoleOutput, createFormatter, type Output } from '../services/output.js';
import { createStreamPrompter, type Prompter } from '../services/prompter.js';
import { createProcessRunner, type ProcessRunner } from '../services/process-runner.js';
import { createErrorHandler } from '../services/error-handler.js';
import { createCommandRegistry, type CommandDefinition } from '../commands/registry.js';
import { builtinCommands } from '../commands/handlers.js';
import { KeepcApp, type AppDependencies } from './app.js';
import type { AppContext } from './context.js';

export interface AppFactoryOptions {
  /** Custom config (defaults to loading from env) */
  config?: KeepcConfig;
  logger?: Logger;
  output?: Output;
  prompter?: Prompter;
  runner?: ProcessRunner;
  /** Subcommands to register (defaults to the built-in set) */
  commands?: CommandDefinition<AppContext>[];
}

/**
 * Creates app dependencies without creating the app itself
 */
export function createAppDependencies(options: AppFactoryOptions = {}): AppDependencies {
  const config = options.config ?? loadConfigFromEnv();
  validateConfig(config);

  const logger = options.logger ?? createLogger(config.logging.level);
  const output = options.output ?? createConsoleOutput();

  const commandRegistry = createCommandRegistry<AppContext>();
  for (const command of options.commands ?? builtinCommands) {
    commandRegistry.register(command);
  }

  logger.debug('Configuration loaded', {
    storePath: config.store.path,
    editor: config.editor.command,
    shell: config.shell.program,
  });

  return {
    config,
    logger,
    output,
    formatter: createFormatter(config.output.color),
    prompter: options.prompter ?? createStreamPrompter(),
    runner: options.runner ?? createProcessRunner(logger),
    errorHandler: createErrorHandler(output, logger),
    commandRegistry,
  };
}

export function createApp(options: AppFactoryOptions = {}): KeepcApp {
  return new KeepcApp(createAppDependencies(options));
}
