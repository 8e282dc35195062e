#!/usr/bin/env node
import { hideBin } from "yargs/helpers";
import { runCli } from "./cli.js";

async function main(): Promise<void> {
  process.exitCode = await runCli(hideBin(process.argv));
}

main().catch((error: unknown) => {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`fatal: ${message}`);
  process.exitCode = 1;
});
