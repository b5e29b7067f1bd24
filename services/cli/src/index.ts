#!/usr/bin/env node
import { runCli } from './cli.js';

async function main() {
  const controller = new AbortController();
  const abort = () => controller.abort();
  process.once('SIGINT', abort);
  process.once('SIGTERM', abort);

  const exitCode = await runCli(process.argv.slice(2), {
    stdout: process.stdout,
    stderr: process.stderr,
    stdin: process.stdin,
    env: process.env,
    cwd: process.cwd(),
    signal: controller.signal
  });

  process.off('SIGINT', abort);
  process.off('SIGTERM', abort);
  process.exitCode = exitCode;
}

main().catch((error) => {
  console.error(error);
  process.exit(2);
});
