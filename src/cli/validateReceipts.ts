#!/usr/bin/env node
import { runValidateCommand } from "./validateCommand";

async function main() {
  process.exitCode = await runValidateCommand(process.argv.slice(2));
}

main().catch((error) => {
  console.error("Fatal error:", error);
  process.exit(1);
});
