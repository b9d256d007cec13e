/**
 * Configuration options for a search invocation
 *
 * All options are optional with conservative defaults.
 */

import type { TransducerModel } from '../model/transducer.js';
import { ConfigError } from './errors.js';
import type { StateId } from './transducer.js';

export interface SearchOptions {
  /** Candidate start states (default: every predefined state) */
  startStates?: readonly StateId[];
  /** Longest trace, in steps, the engine accepts (default: 512) */
  maxSteps?: number;
  /** Collect search metrics (default: true) */
  metrics?: boolean;
}

export interface ResolvedSearchOptions {
  /** Always a subset of the model's states, in declaration order */
  startStates: readonly StateId[];
  maxSteps: number;
  metrics: boolean;
}

export const DEFAULT_MAX_STEPS = 512;

export function resolveSearchOptions(
  model: TransducerModel,
  options: SearchOptions = {}
): ResolvedSearchOptions {
  const maxSteps = options.maxSteps ?? DEFAULT_MAX_STEPS;
  if (!Number.isInteger(maxSteps) || maxSteps <= 0) {
    throw new ConfigError({
      message: `maxSteps must be a positive integer (got ${String(maxSteps)})`,
      context: { setting: 'maxSteps' },
    });
  }

  let startStates = model.states;
  if (options.startStates !== undefined) {
    const requested = new Set(options.startStates);
    const unknown = [...requested].filter((state) => !model.isPredefined(state));
    if (unknown.length > 0) {
      throw new ConfigError({
        message: `Unknown start state(s): ${unknown.join(', ')}`,
        context: { setting: 'startStates', state: unknown[0] },
        suggestions: [`Choose from: ${model.states.join(', ')}`],
      });
    }
    if (requested.size === 0) {
      throw new ConfigError({
        message: 'startStates must name at least one state',
        context: { setting: 'startStates' },
      });
    }
    startStates = model.states.filter((state) => requested.has(state));
  }

  return {
    startStates,
    maxSteps,
    metrics: options.metrics ?? true,
  };
}
