#!/usr/bin/env node
import { runCli } from "./cli/run";

runCli().catch((error) => {
  process.stderr.write(`Fatal error: ${error instanceof Error ? error.message : String(error)}\n`);
  process.exit(1);
});
