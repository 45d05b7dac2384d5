/**
 * Config System
 * Loads and validates configuration from environment variables
 */

import * as os from 'os';
import * as path from 'path';
import { ConfigDirUnavailableError } from './errors.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface ShellConfig {
  program: string;
  flag: string;
}

export interface KeepcConfig {
  store: {
    path: string;
  };
  editor: {
    command: string;
  };
  shell: ShellConfig;
  logging: {
    level: LogLevel;
  };
  output: {
    color: boolean;
  };
}

/**
 * Host facts the config depends on, injectable for tests
 */
export interface SystemInfo {
  platform: NodeJS.Platform;
  homedir: string;
}

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

const LOG_LEVELS: LogLevel[] = ['debug', 'info', 'warn', 'error'];

export const DEFAULT_EDITOR = 'nano';
export const APP_DIR_NAME = 'keepc';
export const STORE_FILE_NAME = 'commands.json';

function isValidLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function nonEmpty(value: string | undefined): string | undefined {
  if (value === undefined || value.trim() === '') {
    return undefined;
  }
  return value.trim();
}

export function currentSystem(): SystemInfo {
  return {
    platform: process.platform,
    homedir: os.homedir(),
  };
}

/**
 * Resolves the per-user configuration directory for the platform
 * Throws ConfigDirUnavailableError when no location can be derived
 */
export function resolveConfigDir(
  env: Record<string, string | undefined>,
  system: SystemInfo
): string {
  if (system.platform === 'win32') {
    const appData = nonEmpty(env.APPDATA);
    if (!appData) {
      throw new ConfigDirUnavailableError('APPDATA is not set');
    }
    return appData;
  }

  const home = nonEmpty(env.HOME) ?? nonEmpty(system.homedir);

  if (system.platform === 'darwin') {
    if (!home) {
      throw new ConfigDirUnavailableError('home directory is unknown');
    }
    return path.join(home, 'Library', 'Application Support');
  }

  const xdg = nonEmpty(env.XDG_CONFIG_HOME);
  if (xdg && path.isAbsolute(xdg)) {
    return xdg;
  }
  if (!home) {
    throw new ConfigDirUnavailableError('neither XDG_CONFIG_HOME nor HOME is set');
  }
  return path.join(home, '.config');
}

export function shellForPlatform(platform: NodeJS.Platform): ShellConfig {
  return platform === 'win32'
    ? { program: 'cmd', flag: '/C' }
    : { program: 'sh', flag: '-c' };
}

export function defaultStorePath(
  env: Record<string, string | undefined>,
  system: SystemInfo
): string {
  return path.join(resolveConfigDir(env, system), APP_DIR_NAME, STORE_FILE_NAME);
}


/**
 * Validates a raw config object against the KeepcConfig schema
 * Throws ConfigurationError if validation fails
 */
export function validateConfig(config: unknown): config is KeepcConfig {
  if (typeof config !== 'object' || config === null || Array.isArray(config)) {
    throw new ConfigurationError('Config must be an object');
  }

  const cfg: Record<string, unknown> = { ...config };

  const section = (name: string): Record<string, unknown> => {
    const value = cfg[name];
    if (typeof value !== 'object' || value === null) {
      throw new ConfigurationError(`Missing required config section: ${name}`);
    }
    return { ...value };
  };

  const store = section('store');
  if (typeof store.path !== 'string' || store.path.trim() === '') {
    throw new ConfigurationError('Missing required config: store.path must be a non-empty string');
  }

  const editor = section('editor');
  if (typeof editor.command !== 'string' || editor.command.trim() === '') {
    throw new ConfigurationError('Missing required config: editor.command must be a non-empty string');
  }

  const shell = section('shell');
  if (typeof shell.program !== 'string' || shell.program.trim() === '') {
    throw new ConfigurationError('Missing required config: shell.program must be a non-empty string');
  }
  if (typeof shell.flag !== 'string') {
    throw new ConfigurationError('Invalid config: shell.flag must be a string');
  }

  const logging = section('logging');
  if (typeof logging.level !== 'string' || !isValidLogLevel(logging.level)) {
    throw new ConfigurationError(
      `Invalid config: logging.level must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  const output = section('output');
  if (typeof output.color !== 'boolean') {
    throw new ConfigurationError('Invalid config: output.color must be a boolean');
  }

  return true;
}


/**
 * Loads configuration from environment variables
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  system: SystemInfo = currentSystem()
): KeepcConfig {
  const logLevel = nonEmpty(env.LOG_LEVEL) ?? 'warn';
  if (!isValidLogLevel(logLevel)) {
    throw new ConfigurationError(
      `Invalid LOG_LEVEL: "${logLevel}". Must be one of: ${LOG_LEVELS.join(', ')}`
    );
  }

  const storePath = nonEmpty(env.KEEPC_STORE_PATH) ?? defaultStorePath(env, system);

  return {
    store: {
      path: path.resolve(storePath),
    },
    editor: {
      command: nonEmpty(env.EDITOR) ?? DEFAULT_EDITOR,
    },
    shell: shellForPlatform(system.platform),
    logging: {
      level: logLevel,
    },
    output: {
      color: nonEmpty(env.NO_COLOR) === undefined,
    },
  };
}
