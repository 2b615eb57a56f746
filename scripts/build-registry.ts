#!/usr/bin/env npx tsx
import "dotenv/config";

/**
 * Rebuild the airport registry (regions) in docs/status.json.
 *
 * Pulls the state's stations from the AviationWeather station feed, or uses
 * the curated list when config/airports.json sets registrySource "config".
 * Existing status fields (including manual overrides) are carried forward.
 *
 * Usage:
 *   npx tsx scripts/build-registry.ts            # Rebuild and write
 *   npx tsx scripts/build-registry.ts --dry-run  # Preview without writing
 */

import { loadConfig } from "../src/lib/config";
import { parseArgs } from "../src/lib/cli-args";
import { getErrorMessage } from "../src/lib/error-utils";
import { runRegistryBuild } from "../src/lib/pipeline";

function printUsage(): void {
  console.log(`
Rebuild the airport list (regions) in status.json.

Usage:
  npx tsx scripts/build-registry.ts [options]

Options:
  --dry-run      Print the summary without writing
  --verbose, -v  List the airports in each region
  --help, -h     Show this help message
`);
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2), ["--dry-run", "--verbose"]);
  if (!parsed.success) {
    console.error(`${parsed.error}\n`);
    printUsage();
    return 1;
  }
  if (parsed.args.help) {
    printUsage();
    return 0;
  }

  const config = await loadConfig();
  const result = await runRegistryBuild(config, parsed.args);
  if (!result.success) {
    console.error(`[Registry] ${result.error}`);
    return result.exitCode;
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`[Registry] Fatal: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
