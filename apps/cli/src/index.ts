#!/usr/bin/env node

import { run } from './cli.js';

process.exitCode = await run(process.argv.slice(2), {
  stdout: (message) => process.stdout.write(message),
  stderr: (message) => process.stderr.write(message),
});
