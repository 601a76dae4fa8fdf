#!/usr/bin/env node
/* eslint-disable no-console */

import { createInterface } from 'node:readline/promises';
import { parseArgs } from 'node:util';
import { buildDefaultCoordinator, unattendedHumanInput } from './app/bootstrap';
import type { HumanInputCallback } from './core/orchestrator/capabilities';
import { config } from './shared/config/env';

const USAGE = 'Usage: agent-orchestrator [--profile conservative|exploratory|fallback] <query...>';

async function readStdin(): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString('utf8').trim();
}

function terminalHumanInput(): HumanInputCallback {
  return async (request) => {
    const rl = createInterface({ input: process.stdin, output: process.stderr });
    try {
      return await rl.question(`\n${request.message}\n> `);
    } finally {
      rl.close();
    }
  };
}

async function main(): Promise<void> {
  const { values, positionals } = parseArgs({
    options: {
      profile: { type: 'string', short: 'p' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });

  if (values.help) {
    console.log(USAGE);
    return;
  }

  const query = positionals.length > 0 ? positionals.join(' ') : await readStdin();
  if (!query) {
    console.error(USAGE);
    process.exitCode = 1;
    return;
  }

  // Interactive prompts share stdin with the query, so they need a query from argv.
  const interactive = config.HIL_INTERACTIVE && positionals.length > 0 && process.stdin.isTTY === true;
  const coordinator = buildDefaultCoordinator({
    profile: values.profile,
    humanInput: interactive ? terminalHumanInput() : unattendedHumanInput,
  });

  const outcome = await coordinator.run(query);
  console.log(outcome.finalAnswer);
  if (outcome.toolLogPath) console.error(`[agent-orchestrator] tool log: ${outcome.toolLogPath}`);
  if (outcome.status === 'FAILED') process.exitCode = 1;
}

main().catch((error) => {
  const text = error instanceof Error ? error.message : String(error);
  console.error('[agent-orchestrator] failed', text);
  process.exitCode = 1;
});
