#!/usr/bin/env node
import { runCli } from './program';

const controller = new AbortController();

process.once('SIGINT', () => {
  console.error('\nStopping: waiting for copies in flight to finish (press Ctrl+C again to force).');
  controller.abort();
});

async function main() {
  process.exitCode = await runCli(process.argv, controller.signal);
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
