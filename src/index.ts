#!/usr/bin/env node
import { runCli } from './release/cli.js';
import { logError } from './utils/logger.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch(async (error: unknown) => {
  const message = error instanceof Error ? (error.stack ?? error.message) : String(error);
  console.error(`Unexpected failure: ${message}`);
  await logError(`[CLI] Unexpected failure: ${message}`);
  process.exitCode = 1;
});
