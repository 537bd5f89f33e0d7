/**
 * Subcommand dispatcher for the bioscout CLI.
 *
 * `runCli` never calls process.exit; it resolves to the exit code so tests can
 * drive it with captured output and a stub toolkit.
 */

import { ConfigValidationError } from '../config/loader.js';
import type { Command, CommandDeps } from './common.js';
import { CliUsageError, EXIT_FAILURE, EXIT_OK } from './common.js';
import { taxonomyCommand } from './taxonomyCommand.js';
import { fastqCommand, searchCommand } from './searchCommand.js';
import { studyCommand } from './studyCommand.js';
import { workflowsCommand } from './workflowsCommand.js';

export type { CommandDeps, CommandIO } from './common.js';

const COMMANDS: Record<string, Command> = {
  taxonomy: taxonomyCommand,
  search: searchCommand,
  fastq: fastqCommand,
  study: studyCommand,
  workflows: workflowsCommand,
};

export const MAIN_USAGE = `Usage: bioscout <command> [options]

Discover public sequencing data and analysis workflows.

Commands:
  taxonomy    Look up an organism in NCBI Taxonomy
  search      Search the European Nucleotide Archive
  fastq       List FASTQ download URLs for a run
  study       Show study metadata for one or more accessions
  workflows   List tested Galaxy workflows from the IWC catalog

Run 'bioscout <command> --help' for the options of a command.`;

/** Errors node:util parseArgs raises for unknown options or missing values. */
function isParseArgsError(err: unknown): err is TypeError & { code: string } {
  return (
    err instanceof TypeError &&
    'code' in err &&
    typeof err.code === 'string' &&
    err.code.startsWith('ERR_PARSE_ARGS')
  );
}

export async function runCli(argv: string[], deps: CommandDeps): Promise<number> {
  const [name, ...rest] = argv;

  if (name === undefined || name === '--help' || name === '-h' || name === 'help') {
    deps.io.stdout(MAIN_USAGE);
    return name === undefined ? EXIT_FAILURE : EXIT_OK;
  }

  const command = COMMANDS[name];
  if (!command) {
    deps.io.stderr(`Unknown command '${name}'`);
    deps.io.stderr(MAIN_USAGE);
    return EXIT_FAILURE;
  }

  try {
    return await command(rest, deps);
  } catch (err) {
    if (err instanceof CliUsageError || isParseArgsError(err)) {
      deps.io.stderr(`Usage error: ${err.message}`);
      deps.io.stderr(`Run 'bioscout ${name} --help' for usage.`);
      return EXIT_FAILURE;
    }
    if (err instanceof ConfigValidationError) {
      deps.io.stderr(err.message);
      return EXIT_FAILURE;
    }
    throw err;
  }
}
