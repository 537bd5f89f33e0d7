#!/usr/bin/env node
/**
 * bioscout command-line entry point.
 *
 * Usage: bioscout <command> [options]
 */

import { loadConfig } from './config/loader.js';
import { createToolkit } from './toolkit.js';
import { runCli } from './cli/index.js';

async function main() {
  const code = await runCli(process.argv.slice(2), {
    io: {
      stdout: (text) => process.stdout.write(text + '\n'),
      stderr: (text) => process.stderr.write(text + '\n'),
    },
    loadToolkit: async (configPath) => createToolkit(await loadConfig(configPath !== undefined ? { configPath } : {})),
  });
  process.exitCode = code;
}

main().catch((err) => {
  process.stderr.write(`Fatal: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exit(1);
});
