#!/usr/bin/env node
import { runExtractCommand } from "./extractCommand";

async function main() {
  process.exitCode = await runExtractCommand(process.argv.slice(2));
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
