#!/usr/bin/env node

/**
 * fleet-restart CLI entry point
 */

import { runCli } from './run.js';

async function main(): Promise<void> {
  const code = await runCli(process.argv.slice(2), {
    stdout: (text) => console.log(text),
    stderr: (text) => console.error(text),
  });
  process.exit(code);
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
