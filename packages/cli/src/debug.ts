import {
  resolveSearchOptions,
  type CompleteTraceResult,
  type SearchOptions,
} from '@tracefit/core';

/**
 * Print the effective search configuration and the search metrics for one
 * trace. Intended to be used behind the --debug flag.
 */
export function printSearchDebug(
  write: (text: string) => void,
  label: string,
  result: CompleteTraceResult,
  search: SearchOptions = {}
): void {
  const effective = resolveSearchOptions(result.model, search);

  write(`[tracefit] ${label}: ${result.steps.length} step(s)\n`);
  write(`[tracefit] effective options: ${JSON.stringify(effective)}\n`);
  write(
    `[tracefit] metrics: ${JSON.stringify(result.completion.metrics ?? null)}\n`
  );
}
