/**
 * Shared fakes for tests
 */

import type { Output } from './services/output.js';
import type { ProcessRunner } from './services/process-runner.js';

export interface MemoryOutput extends Output {
  lines: string[];
  errors: string[];
}

export function createMemoryOutput(): MemoryOutput {
  const lines: string[] = [];
  const errors: string[] = [];
  return {
    lines,
    errors,
    line(text: string) {
      lines.push(text);
    },
    error(text: string) {
      errors.push(text);
    },
  };
}

export interface RunCall {
  program: string;
  args: string[];
}

export interface FakeRunner extends ProcessRunner {
  calls: RunCall[];
}

/**
 * Runner that records calls and resolves through `behavior`
 */
export function createFakeRunner(
  behavior: (call: RunCall) => number | Promise<number> = () => 0
): FakeRunner {
  const calls: RunCall[] = [];
  return {
    calls,
    async run(program, args) {
      const call = { program, args };
      calls.push(call);
      return behavior(call);
    },
  };
}
