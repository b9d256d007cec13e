/**
 * High-level Node API: raw trace text in, cheapest completion out.
 */

import { loadMachine } from './model/machine-loader.js';
import { defaultModel, TransducerModel } from './model/transducer.js';
import { completeSteps } from './search/engine.js';
import type { Completion } from './search/types.js';
import { decodeTrace } from './trace/decoder.js';
import type { SearchOptions } from './types/options.js';
import type { Step } from './types/transducer.js';
import { MetricsCollector } from './util/metrics.js';

export interface CompleteTraceOptions {
  /**
   * A TransducerModel, or an unvalidated machine definition that goes
   * through loadMachine() (default: built-in machine)
   */
  machine?: unknown;
  search?: SearchOptions;
}

export interface CompleteTraceResult {
  model: TransducerModel;
  steps: Step[];
  completion: Completion;
}

function resolveModel(machine: unknown): TransducerModel {
  if (machine === undefined) return defaultModel();
  if (machine instanceof TransducerModel) return machine;
  return loadMachine(machine);
}

/**
 * Decode → load machine → search. Throws TraceError, MachineDefinitionError,
 * ConfigError or SearchError.
 */
export function completeTrace(
  raw: string,
  options: CompleteTraceOptions = {}
): CompleteTraceResult {
  const model = resolveModel(options.machine);
  const metrics = new MetricsCollector({
    enabled: options.search?.metrics ?? true,
  });

  metrics.begin('DECODE');
  const steps = decodeTrace(raw);
  metrics.end('DECODE');

  const completion = completeSteps(steps, {
    model,
    options: options.search,
    metrics,
  });
  return { model, steps, completion };
}
