#!/usr/bin/env node
import { runCli } from './cli/run.js';
import { createRpcClient } from './tools/rpc.js';

runCli(process.argv.slice(2), {
  env: process.env,
  createClient: createRpcClient,
  stdout: process.stdout,
  stderr: process.stderr,
}).then(
  (code) => process.exit(code),
  (error: unknown) => {
    console.error('\nFailed:', error);
    process.exit(1);
  }
);
