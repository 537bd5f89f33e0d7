import { parseArgs } from 'node:util';
import { describeResultTypes, parseResultType } from '../archive/query.js';
import { formatFastqUrls, formatSearchResult } from '../archive/format.js';
import type { Command } from './common.js';
import { COMMON_OPTIONS, CliUsageError, EXIT_FAILURE, EXIT_OK, parseCount, parseFormat, runWithRetry } from './common.js';

export const SEARCH_USAGE = `Usage: bioscout search <query> [options]

Search the European Nucleotide Archive. A bare organism name becomes
scientific_name="<name>", a bare number a taxonomy subtree; portal
expressions such as 'study_accession=PRJEB1234' pass through unchanged.

Options:
  --data-type <type>     read (default), fastq, assembly, wgs, sequence, study, sample, analysis
  --limit <n>            Page size (default: 10)
  --offset <n>           Records to skip (default: 0)
  --fields <a,b,...>     Fields to return instead of the type's defaults
  --show-urls            Show HTTPS download URLs for FASTQ files
  --format human|json    Output format (default: human)
  --retries <n>          Total attempts for transient failures
  --config <path>        Config file

Examples:
  bioscout search "Saccharomyces cerevisiae" --limit 5
  bioscout search "Mus musculus" --data-type assembly --format json
  bioscout search 'scientific_name="Homo sapiens" AND library_strategy="RNA-Seq"' --show-urls`;

export const FASTQ_USAGE = `Usage: bioscout fastq <run accession> [options]

List HTTPS download URLs for one run's FASTQ files.

Options:
  --format human|json    Output format (default: human)
  --retries <n>          Total attempts for transient failures
  --config <path>        Config file`;

export const searchCommand: Command = async (argv, deps) => {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      ...COMMON_OPTIONS,
      'data-type': { type: 'string' },
      type: { type: 'string' },
      limit: { type: 'string' },
      offset: { type: 'string' },
      fields: { type: 'string' },
      'show-urls': { type: 'boolean' },
    },
    allowPositionals: true,
    strict: true,
  });

  if (values.help) {
    deps.io.stdout(SEARCH_USAGE);
    return EXIT_OK;
  }

  const format = parseFormat(values.format);
  const query = positionals.join(' ').trim();
  if (!query) {
    throw new CliUsageError('a search query is required');
  }

  const dataType = values['data-type'] ?? values.type ?? 'read';
  if (!parseResultType(dataType)) {
    throw new CliUsageError(`unknown data type '${dataType}' (expected one of: ${describeResultTypes()})`);
  }
  const limit = parseCount(values.limit, 'limit');
  const offset = parseCount(values.offset, 'offset');
  const fields = values.fields
    ?.split(',')
    .map((f) => f.trim())
    .filter((f) => f.length > 0);
  const showUrls = values['show-urls'] ?? false;

  const toolkit = await deps.loadToolkit(values.config);
  const result = await runWithRetry(
    () =>
      toolkit.archive.search(query, {
        resultType: dataType,
        ...(limit !== undefined ? { limit } : {}),
        ...(offset !== undefined ? { offset } : {}),
        ...(fields ? { fields } : {}),
        includeUrls: showUrls,
      }),
    toolkit,
    values.retries,
    deps
  );

  deps.io.stdout(formatSearchResult(result, { format, showUrls }));
  return result.success ? EXIT_OK : EXIT_FAILURE;
};

export const fastqCommand: Command = async (argv, deps) => {
  const { values, positionals } = parseArgs({
    args: argv,
    options: COMMON_OPTIONS,
    allowPositionals: true,
    strict: true,
  });

  if (values.help) {
    deps.io.stdout(FASTQ_USAGE);
    return EXIT_OK;
  }

  const format = parseFormat(values.format);
  const [runAccession, ...extra] = positionals;
  if (!runAccession || extra.length > 0) {
    throw new CliUsageError('exactly one run accession is required');
  }

  const toolkit = await deps.loadToolkit(values.config);
  const result = await runWithRetry(() => toolkit.archive.getFastqUrls(runAccession), toolkit, values.retries, deps);

  deps.io.stdout(formatFastqUrls(result, format));
  return result.success ? EXIT_OK : EXIT_FAILURE;
};
