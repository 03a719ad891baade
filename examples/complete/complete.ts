#!/usr/bin/env node
/**
 * One-shot completion
 *
 * Usage:
 *   npx tsx complete.ts --engine ./my-engine.ts --deterministic "Write a haiku about rivers"
 */

import { completion, parseArgs, showHelp } from "../../src/index.js";

async function main(): Promise<void> {
  const args = process.argv.slice(2);
  const { help, positional } = parseArgs(args);
  const prompt = positional.join(" ");

  if (help || !prompt) {
    process.stdout.write(showHelp());
    process.stdout.write("\nPass the prompt as the remaining arguments.\n");
    return;
  }

  process.stdout.write((await completion(args, prompt)) + "\n");
}

main().catch((err: unknown) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
