import { ConfigError, type SearchOptions } from '@tracefit/core';

export type OutputFormat = 'text' | 'markdown' | 'json';

const OUTPUT_FORMATS: readonly OutputFormat[] = ['text', 'markdown', 'json'];

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  format?: string;
  machine?: string;
  start?: string;
  maxSteps?: string;
  // Commander sets metrics=false when --no-metrics is used
  metrics?: boolean;
  debug?: boolean;
}

export function resolveOutputFormat(value?: string): OutputFormat {
  const normalized = (value ?? 'text').trim().toLowerCase();
  const format = OUTPUT_FORMATS.find((candidate) => candidate === normalized);
  if (!format) {
    throw new ConfigError({
      message: `Unknown output format "${value ?? ''}"`,
      context: { setting: 'format' },
      suggestions: [`Use one of: ${OUTPUT_FORMATS.join(', ')}`],
    });
  }
  return format;
}

/** "S0, S2" → ['S0', 'S2']; an empty list is left for option resolution to reject. */
export function parseStartStates(value?: string): string[] | undefined {
  if (value === undefined) return undefined;
  return value
    .split(',')
    .map((state) => state.trim())
    .filter(Boolean);
}

export function parseMaxSteps(value?: string): number | undefined {
  if (value === undefined) return undefined;
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new ConfigError({
      message: `--max-steps expects a positive integer (got "${value}")`,
      context: { setting: 'maxSteps', valueExcerpt: value },
    });
  }
  return Number.parseInt(trimmed, 10);
}

/**
 * Parse CLI options into SearchOptions; only flags the user passed are set.
 */
export function parseSearchOptions(options: CliOptions): SearchOptions {
  const search: SearchOptions = {};

  const startStates = parseStartStates(options.start);
  if (startStates !== undefined) {
    search.startStates = startStates;
  }

  const maxSteps = parseMaxSteps(options.maxSteps);
  if (maxSteps !== undefined) {
    search.maxSteps = maxSteps;
  }

  if (typeof options.metrics === 'boolean') {
    search.metrics = options.metrics;
  }

  return search;
}
