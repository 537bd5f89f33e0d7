/**
 * Shared plumbing for the bioscout subcommands.
 */

import type { Toolkit } from '../toolkit.js';
import type { RetryOptions } from '../retry/RetryPolicy.js';
import { withRetry } from '../retry/RetryPolicy.js';
import type { OutputFormat } from '../types/results.js';
import { OUTPUT_FORMATS } from '../types/results.js';

export interface CommandIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CommandDeps {
  io: CommandIO;
  /** Build the clients, reading the config file at `configPath` if given. */
  loadToolkit: (configPath?: string) => Promise<Toolkit>;
  /** Replaces the retry wrapper's sleep (tests). */
  sleep?: (ms: number) => Promise<void>;
}

export type Command = (argv: string[], deps: CommandDeps) => Promise<number>;

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;

/**
 * Bad arguments, detected before any request is made.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

/** Options every subcommand accepts. */
export const COMMON_OPTIONS = {
  format: { type: 'string' },
  config: { type: 'string' },
  retries: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
} as const;

export function parseFormat(value: string | undefined, fallback: OutputFormat = 'human'): OutputFormat {
  if (value === undefined) return fallback;
  const format = OUTPUT_FORMATS.find((f) => f === value);
  if (!format) {
    throw new CliUsageError(`--format must be one of: ${OUTPUT_FORMATS.join(', ')}`);
  }
  return format;
}

/**
 * Parse a non-negative integer option; `min` raises the floor.
 */
export function parseCount(value: string | undefined, name: string, min = 0): number | undefined {
  if (value === undefined) return undefined;
  if (!/^\d+$/.test(value.trim())) {
    throw new CliUsageError(`--${name} must be a whole number`);
  }
  const parsed = Number(value);
  if (parsed < min) {
    throw new CliUsageError(`--${name} must be at least ${min}`);
  }
  return parsed;
}

export function retryOptions(toolkit: Toolkit, retries: string | undefined, deps: CommandDeps): RetryOptions {
  const maxAttempts = parseCount(retries, 'retries', 1) ?? toolkit.config.retry.maxAttempts;
  return {
    maxAttempts,
    baseDelayMs: toolkit.config.retry.baseDelayMs,
    maxDelayMs: toolkit.config.retry.maxDelayMs,
    ...(deps.sleep ? { sleep: deps.sleep } : {}),
    onRetry: ({ attempt, delayMs, policy }) => {
      deps.io.stderr(`Attempt ${attempt} failed (${policy.failureCode}); retrying in ${delayMs}ms`);
    },
  };
}

export function runWithRetry<T extends { success: boolean }>(
  operation: () => Promise<T>,
  toolkit: Toolkit,
  retries: string | undefined,
  deps: CommandDeps
): Promise<T> {
  return withRetry(operation, retryOptions(toolkit, retries, deps));
}
