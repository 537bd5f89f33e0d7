import { parseArgs } from 'node:util';
import { formatBatchStudyResult, formatStudyResult } from '../study/format.js';
import type { Command } from './common.js';
import { withRetry } from '../retry/RetryPolicy.js';
import { COMMON_OPTIONS, CliUsageError, EXIT_FAILURE, EXIT_OK, parseFormat, retryOptions } from './common.js';

export const STUDY_USAGE = `Usage: bioscout study <accession> [<accession> ...] [options]

Fetch study (BioProject) metadata from ENA. Accepts PRJEB, PRJNA and PRJDB
accessions. A study that does not exist is reported, not treated as a failure.

Options:
  --format human|json    Output format (default: human)
  --retries <n>          Total attempts for transient failures
  --config <path>        Config file`;

export const studyCommand: Command = async (argv, deps) => {
  const { values, positionals } = parseArgs({
    args: argv,
    options: COMMON_OPTIONS,
    allowPositionals: true,
    strict: true,
  });

  if (values.help) {
    deps.io.stdout(STUDY_USAGE);
    return EXIT_OK;
  }

  const format = parseFormat(values.format);
  if (positionals.length === 0) {
    throw new CliUsageError('at least one study accession is required');
  }
  const malformed = positionals.find((a) => !/^[A-Za-z0-9_.-]+$/.test(a) || /^\d+$/.test(a));
  if (malformed !== undefined) {
    throw new CliUsageError(`'${malformed}' is not a valid accession`);
  }

  const toolkit = await deps.loadToolkit(values.config);
  const retry = retryOptions(toolkit, values.retries, deps);
  // Retries apply to each accession's lookup, not to the batch.
  const lookup = (accession: string) => withRetry(() => toolkit.studies.getDetails(accession), retry);

  const [only] = positionals;
  if (positionals.length === 1 && only !== undefined) {
    const result = await lookup(only);
    deps.io.stdout(formatStudyResult(result, format));
    return result.success ? EXIT_OK : EXIT_FAILURE;
  }

  const batch = await toolkit.studies.getMultipleDetails(positionals, lookup);
  deps.io.stdout(formatBatchStudyResult(batch, format));
  if (!batch.success) {
    return EXIT_FAILURE;
  }
  return Object.values(batch.results).every((entry) => entry.success) ? EXIT_OK : EXIT_FAILURE;
};
