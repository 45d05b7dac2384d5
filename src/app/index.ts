/**
 * App module exports
 */

export {
  type AppContext,
  openStore,
  persistStore,
  operationIo,
} from './context.js';

export {
  type AppDependencies,
  KeepcApp,
  flattenArgs,
  PROGRAM_NAME,
  FALLBACK_COMMAND,
} from './app.js';

export {
  type AppFactoryOptions,
  createApp,
  createAppDependencies,
} from './factory.js';
