/**
 * Argument parsing shared by the scripts in scripts/
 */

export interface ParsedArgs {
  dryRun: boolean; // --dry-run
  verbose: boolean; // --verbose, -v
  rebuildRegistry: boolean; // --rebuild-registry
  help: boolean; // --help, -h
}

export type ArgFlag = "--dry-run" | "--verbose" | "--rebuild-registry";

export type ParseArgsResult =
  | { success: true; args: ParsedArgs }
  | { success: false; error: string };

/**
 * Parse argv (without node and script path). Flags outside `allowed`
 * are rejected so each script only accepts what it implements.
 */
export function parseArgs(argv: string[], allowed: ArgFlag[]): ParseArgsResult {
  const parsed: ParsedArgs = {
    dryRun: false,
    verbose: false,
    rebuildRegistry: false,
    help: false,
  };

  for (const arg of argv) {
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (arg === "--dry-run" && allowed.includes("--dry-run")) {
      parsed.dryRun = true;
    } else if ((arg === "--verbose" || arg === "-v") && allowed.includes("--verbose")) {
      parsed.verbose = true;
    } else if (arg === "--rebuild-registry" && allowed.includes("--rebuild-registry")) {
      parsed.rebuildRegistry = true;
    } else {
      return { success: false, error: `Unknown argument: ${arg}` };
    }
  }

  return { success: true, args: parsed };
}
