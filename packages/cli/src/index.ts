#!/usr/bin/env node
import { runCli } from './program';

async function main() {
  process.exitCode = await runCli(process.argv);
}

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
