/**
 * Output
 * Line-oriented writers for stdout/stderr and the entry formatter
 */

import chalk, { Chalk, type ChalkInstance } from 'chalk';

export interface Output {
  /** Writes one line to standard output */
  line(text: string): void;
  /** Writes one line to standard error */
  error(text: string): void;
}

export function createConsoleOutput(): Output {
  return {
    line(text: string) {
      process.stdout.write(`${text}\n`);
    },
    error(text: string) {
      process.stderr.write(`${text}\n`);
    },
  };
}

export interface Formatter {
  /** `$ <command>: <description>` */
  entry(command: string, description: string): string;
  /** `[<index>] <command>: <description>` */
  numbered(index: number, command: string, description: string): string;
}

export function createFormatter(color: boolean): Formatter {
  const paint: ChalkInstance = color ? chalk : new Chalk({ level: 0 });

  const body = (command: string, description: string) =>
    `${paint.greenBright(command)}${paint.blue(`: ${description}`)}`;

  return {
    entry(command, description) {
      return `$ ${body(command, description)}`;
    },
    numbered(index, command, description) {
      return `[${index}] ${body(command, description)}`;
    },
  };
}
