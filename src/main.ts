#!/usr/bin/env node
/**
 * agent-timeline binary.
 *
 * Run: node dist/main.js replay events.jsonl
 */

// Load environment (AGENT_TIMELINE_DEBUG, XDG_* overrides)
import { config } from 'dotenv';
config();

import { runCli } from './cli.js';

async function main(): Promise<void> {
  process.exitCode = await runCli(process.argv.slice(2));
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
