#!/usr/bin/env -S npx tsx
import { runCli } from './cli/program.js';
import { createConsolePresenter } from './cli/utils.js';

process.exitCode = await runCli(process.argv.slice(2), {
  cwd: process.cwd(),
  env: process.env,
  presenter: createConsolePresenter(),
  stdin: process.stdin,
});
