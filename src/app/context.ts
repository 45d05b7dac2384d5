/**
 * Application Context
 * Everything a command handler may touch during one invocation
 */

import type { KeepcConfig } from '../core/config.js';
import type { Logger } from '../core/logger.js';
import type { Formatter, Output } from '../services/output.js';
import type { Prompter } from '../services/prompter.js';
import type { ProcessRunner } from '../services/process-runner.js';
import type { OperationIo } from '../services/operations.js';
import { loadStore, saveStore, type CommandStore } from '../storage/command-store.js';

export interface AppContext {
  config: KeepcConfig;
  logger: Logger;
  output: Output;
  formatter: Formatter;
  prompter: Prompter;
  runner: ProcessRunner;
}

export function openStore(ctx: AppContext): CommandStore {
  return loadStore(ctx.config.store.path, ctx.logger);
}

export function persistStore(ctx: AppContext, store: CommandStore): void {
  saveStore(store, ctx.config.store.path, ctx.logger);
}

export function operationIo(ctx: AppContext): OperationIo {
  return {
    prompter: ctx.prompter,
    output: ctx.output,
    formatter: ctx.formatter,
    logger: ctx.logger,
  };
}
