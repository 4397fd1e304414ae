#!/usr/bin/env node

import { runCli } from './run.js';

async function main() {
  const { output, exitCode } = await runCli(process.argv.slice(2));

  if (typeof output === 'string') {
    process.stdout.write(`${output}\n`);
  } else {
    process.stdout.write(`${JSON.stringify(output, null, 2)}\n`);
  }
  process.exitCode = exitCode;
}

main().catch((err: unknown) => {
  process.stderr.write(`bidledger: ${err instanceof Error ? err.message : 'unknown error'}\n`);
  process.exitCode = 2;
});
