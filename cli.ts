#!/usr/bin/env node
import { createProgram } from "./src/cli/program";
import { getLogger } from "./src/lib/logger";

const logger = getLogger("cli");

async function main() {
  await createProgram().parseAsync(process.argv);
}

main().catch((err: unknown) => {
  logger.error({ err }, "Command failed");
  console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
  process.exit(1);
});
