#!/usr/bin/env node
/**
 * Interactive chat over any engine module
 *
 * Usage:
 *   npx tsx chat.ts --engine ./my-engine.ts --multiturn 1
 *   TURNLOOP_ENGINE=my-engine npx tsx chat.ts --deterministic
 *   npx tsx chat.ts --engine my-engine --jsonl   # per-turn stats as JSONL on stderr
 *
 * Every flag from `--help` is accepted. Enter %q or %Q to quit.
 */

import { chat, ConfigValidationError } from "../../src/index.js";
import type { TurnStats } from "../../src/index.js";

async function main(): Promise<void> {
  const argv = process.argv.slice(2);
  const jsonl = argv.includes("--jsonl");
  const args = argv.filter((a) => a !== "--jsonl");

  const emit = (stats: TurnStats): void => {
    process.stderr.write(JSON.stringify({ event: "turn", ...stats }) + "\n");
  };

  const result = await chat(args, { onTurn: jsonl ? emit : undefined });
  if (result && jsonl) {
    process.stderr.write(JSON.stringify({ event: "end", ...result }) + "\n");
  }
}

main().catch((err: unknown) => {
  // chat() has already printed the usage text
  if (!(err instanceof ConfigValidationError)) {
    console.error("Error:", err instanceof Error ? err.message : String(err));
  }
  process.exit(1);
});
