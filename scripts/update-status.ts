#!/usr/bin/env npx tsx
import "dotenv/config";

/**
 * Refresh docs/status.json with FAA closures/impacts and METAR flight categories.
 *
 * Run on a schedule (e.g., every 5 minutes from GitHub Actions).
 *
 * Usage:
 *   npx tsx scripts/update-status.ts                     # Refresh statuses
 *   npx tsx scripts/update-status.ts --rebuild-registry  # Rebuild airport list first
 *   npx tsx scripts/update-status.ts --dry-run -v        # Preview without writing
 */

import { loadConfig } from "../src/lib/config";
import { parseArgs } from "../src/lib/cli-args";
import { getErrorMessage } from "../src/lib/error-utils";
import { runStatusRefresh } from "../src/lib/pipeline";

function printUsage(): void {
  console.log(`
Refresh airport statuses in status.json from the FAA NAS Status and METAR feeds.

Usage:
  npx tsx scripts/update-status.ts [options]

Options:
  --rebuild-registry  Rebuild the airport list before refreshing
  --dry-run           Print the summary without writing
  --verbose, -v       Show per-airport detail
  --help, -h          Show this help message

Environment:
  STATUS_JSON_PATH           Output file (default: docs/status.json)
  AIRPORTS_CONFIG_PATH       Airports config (default: config/airports.json)
  HTTP_TIMEOUT_MS            Request timeout (default: 25000)
  HTTP_RETRIES               Retries after the first attempt (default: 2)
  HTTP_BACKOFF_MS            Delay between attempts (default: 2000)
  SLEEP_BETWEEN_REQUESTS_MS  Pause between METAR requests (default: 0)
`);
}

async function main(): Promise<number> {
  const parsed = parseArgs(process.argv.slice(2), ["--rebuild-registry", "--dry-run", "--verbose"]);
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
  const result = await runStatusRefresh(config, parsed.args);
  if (!result.success) {
    console.error(`[Refresh] ${result.error}`);
    return result.exitCode;
  }
  return 0;
}

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error(`[Refresh] Fatal: ${getErrorMessage(error)}`);
    process.exitCode = 1;
  });
