/**
 * Tests for Process Runner
 */

import { describe, it, expect } from 'vitest';
import { ChildProcess, type SpawnOptions } from 'node:child_process';
import * as os from 'node:os';
import {
  createProcessRunner,
  shellInvocation,
  parseEditorCommand,
  signalExitStatus,
  SIGNAL_EXIT_BASE,
  type SpawnFn,
} from './process-runner.js';
import { createLogger, type LogEntry } from '../core/logger.js';

/**
 * Spawn stand-in whose child emits the given events on the next tick
 */
function fakeSpawn(emit: (child: ChildProcess) => void) {
  const calls: { command: string; args: readonly string[]; options: SpawnOptions }[] = [];
  const spawn: SpawnFn = (command, args, options) => {
    calls.push({ command, args, options });
    const child = new ChildProcess();
    setImmediate(() => emit(child));
    return child;
  };
  return { spawn, calls };
}

describe('Process Runner', () => {
  it('resolves with the exit code', async () => {
    const { spawn, calls } = fakeSpawn(child => child.emit('close', 3, null));
    const runner = createProcessRunner(undefined, spawn);

    await expect(runner.run('sh', ['-c', 'exit 3'])).resolves.toBe(3);
    expect(calls).toEqual([{ command: 'sh', args: ['-c', 'exit 3'], options: { stdio: 'inherit' } }]);
  });

  it('reports 128 plus the signal number for a killed child', async () => {
    const { spawn } = fakeSpawn(child => child.emit('close', null, 'SIGTERM'));
    const runner = createProcessRunner(undefined, spawn);

    await expect(runner.run('sleep', ['10'])).resolves.toBe(128 + os.constants.signals.SIGTERM);
  });

  it('tells signals apart', () => {
    expect(signalExitStatus('SIGINT')).toBe(128 + os.constants.signals.SIGINT);
    expect(signalExitStatus('SIGINT')).not.toBe(signalExitStatus('SIGTERM'));
    expect(signalExitStatus(null)).toBe(SIGNAL_EXIT_BASE);
  });

  it('rejects when the program cannot be started', async () => {
    const { spawn } = fakeSpawn(child => child.emit('error', new Error('spawn nope ENOENT')));
    const runner = createProcessRunner(undefined, spawn);

    await expect(runner.run('nope', [])).rejects.toThrow('spawn nope ENOENT');
  });

  it('logs spawn and exit at debug level', async () => {
    const entries: LogEntry[] = [];
    const logger = createLogger('debug', (entry) => entries.push(entry));
    const { spawn } = fakeSpawn(child => child.emit('close', 0, null));

    await createProcessRunner(logger, spawn).run('vim', ['/tmp/x']);

    expect(entries.map(e => e.message)).toEqual(['Spawning process', 'Process exited']);
    expect(entries[1].context).toEqual({ program: 'vim', status: 0, signal: null });
  });
});

describe('shellInvocation', () => {
  it('passes the command as a single argument after the flag', () => {
    expect(shellInvocation({ program: 'sh', flag: '-c' }, 'echo "a b" | wc -c')).toEqual({
      program: 'sh',
      args: ['-c', 'echo "a b" | wc -c'],
    });
    expect(shellInvocation({ program: 'cmd', flag: '/C' }, 'dir')).toEqual({
      program: 'cmd',
      args: ['/C', 'dir'],
    });
  });
});

describe('parseEditorCommand', () => {
  it('splits program and arguments', () => {
    expect(parseEditorCommand('nano')).toEqual({ program: 'nano', args: [] });
    expect(parseEditorCommand('  code   --wait ')).toEqual({ program: 'code', args: ['--wait'] });
  });
});
