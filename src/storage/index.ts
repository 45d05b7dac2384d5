/**
 * Storage exports
 */

export {
  type CommandEntry,
  type StoreFile,
  CommandStore,
  loadStore,
  saveStore,
  serializeStore,
} from './command-store.js';
