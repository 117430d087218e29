#!/usr/bin/env node
/**
 * CLI: Generate a PPTX deck from a topic.
 *
 * Usage:
 *   npx tsx scripts/generate-deck.ts "<topic>" --out <file.pptx>
 *
 * Exit codes:
 *   0 = success
 *   1 = generation failed (API error, invalid outline, write failure)
 *   2 = usage or configuration error
 */
import { runCli } from "../src/cli/run-cli.js";

runCli(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error("Error:", err instanceof Error ? err.message : err);
    process.exitCode = 2;
  }
);
