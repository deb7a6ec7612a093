#!/usr/bin/env node
import { runProvisionImage } from "../commands/provision-image";

async function main(): Promise<void> {
  const exitCode = await runProvisionImage(process.argv.slice(2));
  process.exit(exitCode);
}

main().catch((error) => {
  console.error(error instanceof Error ? error.message : String(error));
  process.exit(1);
});
