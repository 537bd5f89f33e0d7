import { parseArgs } from 'node:util';
import { formatTaxonomyResult } from '../taxonomy/format.js';
import type { Command } from './common.js';
import { COMMON_OPTIONS, CliUsageError, EXIT_FAILURE, EXIT_OK, parseFormat, runWithRetry } from './common.js';

export const TAXONOMY_USAGE = `Usage: bioscout taxonomy <organism name> | --tax-id <id> [options]

Resolve an organism name to its NCBI taxonomy record, or look one up by id.
The first suggestion returned by NCBI is taken as the match.

Options:
  --tax-id <id>          Look up a taxonomy id instead of a name
  --detailed             Include the lineage
  --format human|json    Output format (default: human)
  --retries <n>          Total attempts for transient failures
  --config <path>        Config file

Examples:
  bioscout taxonomy "Plasmodium falciparum"
  bioscout taxonomy --tax-id 5833 --detailed`;

export const taxonomyCommand: Command = async (argv, deps) => {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      ...COMMON_OPTIONS,
      'tax-id': { type: 'string' },
      detailed: { type: 'boolean' },
    },
    allowPositionals: true,
    strict: true,
  });

  if (values.help) {
    deps.io.stdout(TAXONOMY_USAGE);
    return EXIT_OK;
  }

  const format = parseFormat(values.format);
  const name = positionals.join(' ').trim();
  const taxIdValue = values['tax-id'];

  if (name && taxIdValue !== undefined) {
    throw new CliUsageError('pass either an organism name or --tax-id, not both');
  }
  if (!name && taxIdValue === undefined) {
    throw new CliUsageError('an organism name or --tax-id is required');
  }
  if (taxIdValue !== undefined && !/^\d+$/.test(taxIdValue.trim())) {
    throw new CliUsageError('--tax-id must be a positive integer');
  }

  const toolkit = await deps.loadToolkit(values.config);
  const result = await runWithRetry(
    () => (taxIdValue !== undefined ? toolkit.taxonomy.getByTaxId(Number(taxIdValue)) : toolkit.taxonomy.searchByName(name)),
    toolkit,
    values.retries,
    deps
  );

  deps.io.stdout(formatTaxonomyResult(result, format, values.detailed ?? false));
  return result.success ? EXIT_OK : EXIT_FAILURE;
};
