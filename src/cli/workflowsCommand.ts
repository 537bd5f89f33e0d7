import { parseArgs } from 'node:util';
import { formatCategoryList, formatWorkflowSearch } from '../workflows/format.js';
import type { Command } from './common.js';
import { COMMON_OPTIONS, CliUsageError, EXIT_FAILURE, EXIT_OK, parseCount, parseFormat, runWithRetry } from './common.js';

export const WORKFLOWS_USAGE = `Usage: bioscout workflows [options]

List tested Galaxy workflows from the IWC manifest.

Options:
  --category <name>      Keep workflows in this category (case-insensitive exact match)
  --limit <n>            Return at most n workflows
  --list-categories      List the categories instead of workflows
  --format human|json    Output format (default: json)
  --retries <n>          Total attempts for transient failures
  --config <path>        Config file`;

export const workflowsCommand: Command = async (argv, deps) => {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      ...COMMON_OPTIONS,
      category: { type: 'string' },
      limit: { type: 'string' },
      'list-categories': { type: 'boolean' },
    },
    allowPositionals: true,
    strict: true,
  });

  if (values.help) {
    deps.io.stdout(WORKFLOWS_USAGE);
    return EXIT_OK;
  }
  if (positionals.length > 0) {
    throw new CliUsageError(`unexpected argument '${positionals.join(' ')}'`);
  }

  const format = parseFormat(values.format, 'json');
  const limit = parseCount(values.limit, 'limit');
  if (values['list-categories'] && (values.category !== undefined || limit !== undefined)) {
    throw new CliUsageError('--list-categories cannot be combined with --category or --limit');
  }
  const toolkit = await deps.loadToolkit(values.config);

  if (values['list-categories']) {
    const result = await runWithRetry(() => toolkit.workflows.listCategories(), toolkit, values.retries, deps);
    deps.io.stdout(formatCategoryList(result, format));
    return result.success ? EXIT_OK : EXIT_FAILURE;
  }

  const result = await runWithRetry(
    () =>
      toolkit.workflows.search({
        ...(values.category !== undefined ? { category: values.category } : {}),
        ...(limit !== undefined ? { limit } : {}),
      }),
    toolkit,
    values.retries,
    deps
  );
  deps.io.stdout(formatWorkflowSearch(result, format));
  return result.success ? EXIT_OK : EXIT_FAILURE;
};
