/**
 * Support Insights - Main Entry Point
 *
 * Loads customer-support message and session exports, computes volume,
 * operator, latency and closure metrics, tags message sentiment and
 * summarises the headline facts.
 *
 * Usage:
 *  npx tsx src/index.ts path/to/exports/ [report.json] [--from YYYY-MM-DD] [--to YYYY-MM-DD]
 */

import { fileURLToPath } from "node:url";
import path from "node:path";
import { runCLI } from './cli';

// ============================================================================
// MAIN ENTRY POINT
// ============================================================================

/**
 * Checks if this script is being run directly (not imported as a module)
 */
function isMainModule(): boolean {
    const thisFile = fileURLToPath(import.meta.url);
    return !!process.argv[1] && path.resolve(process.argv[1]) === thisFile;
}

// Run CLI if this is the main module
if (isMainModule()) {
  runCLI(process.argv)
    .then(code => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error("❌ Unexpected error:", error);
      process.exitCode = 1;
    });
}

// ============================================================================
// LIBRARY EXPORTS
// ============================================================================

export * from './types';
export * from './parsers';
export * from './analysis';
export * from './utils';
export * from './cli';
