#!/usr/bin/env node
/**
 * keepc
 * Keep and manage useful shell commands
 */

import 'dotenv/config';
import { createApp } from './app/index.js';

async function main(): Promise<number> {
  try {
    const app = createApp();
    return await app.run(process.argv.slice(2));
  } catch (error) {
    // Config failures happen before the app's error handler exists
    console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

main().then((code) => {
  process.exitCode = code;
});
