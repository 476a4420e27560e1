#!/usr/bin/env node
/**
 * master-dispatch - CLI entry point.
 *
 * Ctrl+C cancels a running dispatch: units in flight finish, the rest are
 * reported as cancelled.
 */

import { runCli } from './cli';

async function main(): Promise<void> {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const exitCode = await runCli(process.argv.slice(2), { signal: controller.signal });
  process.exitCode = exitCode;
}

main().catch((error: unknown) => {
  process.stderr.write(`${error instanceof Error ? (error.stack ?? error.message) : String(error)}\n`);
  process.exitCode = 1;
});
