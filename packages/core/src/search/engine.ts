import { ErrorCode } from '../errors/codes.js';
import { synthesizedStateId } from '../model/states.js';
import { defaultModel, type TransducerModel } from '../model/transducer.js';
import { InternalError, SearchError, TraceError } from '../types/errors.js';
import { resolveSearchOptions, type SearchOptions } from '../types/options.js';
import { err, isErr, ok, type Result } from '../types/result.js';
import type { StateId, Step, TransitionTarget } from '../types/transducer.js';
import { MetricsCollector } from '../util/metrics.js';
import { ExtensionSet } from './extension-set.js';
import type { Completion, ExtensionTransition, PathTransition } from './types.js';

/** Cheapest continuation from one search node to the end of the trace. */
interface SubResult {
  readonly cost: number;
  readonly path: readonly PathTransition[];
}

/** Branch state carried through the recursion. */
interface Branch {
  readonly index: number;
  readonly state: StateId;
  readonly extensions: ExtensionSet;
  readonly synthesized: number;
}

const COST_EXTENSION = 1;
const COST_NEW_STATE = 1;

const END_OF_TRACE: SubResult = { cost: 0, path: [] };

function nodeKey(branch: Branch): string {
  return JSON.stringify([
    branch.index,
    branch.state,
    branch.extensions.key,
    branch.synthesized,
  ]);
}

function cheaper(
  best: SubResult | null,
  candidate: SubResult | null
): SubResult | null {
  if (!candidate) return best;
  if (!best || candidate.cost < best.cost) return candidate;
  return best;
}

/**
 * One solve() invocation. Owns the memo, so nothing leaks between traces;
 * the memo is shared across start states because the state is part of the key.
 */
export class SearchSession {
  readonly #steps: readonly Step[];
  readonly #model: TransducerModel;
  readonly #metrics: MetricsCollector;
  // null marks a node with no legal continuation
  readonly #memo = new Map<string, SubResult | null>();

  constructor(
    steps: readonly Step[],
    model: TransducerModel,
    metrics: MetricsCollector
  ) {
    this.#steps = steps;
    this.#model = model;
    this.#metrics = metrics;
  }

  get cacheSize(): number {
    return this.#memo.size;
  }

  run(start: StateId): SubResult | null {
    return this.#search({
      index: 0,
      state: start,
      extensions: ExtensionSet.EMPTY,
      synthesized: 0,
    });
  }

  #search(branch: Branch): SubResult | null {
    if (branch.index === this.#steps.length) return END_OF_TRACE;

    const key = nodeKey(branch);
    const cached = this.#memo.get(key);
    if (cached !== undefined) {
      this.#metrics.addCacheHit();
      return cached;
    }

    this.#metrics.addNodeExpanded();
    const result = this.#expand(branch);
    this.#memo.set(key, result);
    return result;
  }

  #expand(branch: Branch): SubResult | null {
    const step = this.#steps[branch.index];
    if (!step) {
      throw new InternalError({
        message: `Step ${branch.index} is out of range`,
        context: { stepIndex: branch.index },
      });
    }
    const { state, extensions } = branch;
    let best: SubResult | null = null;

    const predefined = this.#model.lookup(state, step.input);
    if (predefined) {
      best = cheaper(best, this.#follow(branch, step, predefined, 'predefined'));
    }

    const reused = extensions.get(state, step.input);
    if (reused) {
      best = cheaper(best, this.#follow(branch, step, reused, 'reused'));
    }

    // An existing (state, input) transition is never overwritten.
    if (predefined || reused) return best;

    for (const destination of this.#reachableStates(extensions)) {
      best = cheaper(
        best,
        this.#extend(branch, step, destination, false, COST_EXTENSION)
      );
    }

    const fresh = synthesizedStateId(branch.synthesized + 1);
    best = cheaper(
      best,
      this.#extend(branch, step, fresh, true, COST_EXTENSION + COST_NEW_STATE)
    );
    return best;
  }

  /** Take an existing transition; a mismatched output kills the branch. */
  #follow(
    branch: Branch,
    step: Step,
    target: TransitionTarget,
    kind: 'predefined' | 'reused'
  ): SubResult | null {
    if (target.output !== step.output) return null;
    const rest = this.#search({
      ...branch,
      index: branch.index + 1,
      state: target.to,
    });
    if (!rest) return null;
    const transition: PathTransition = {
      from: branch.state,
      input: step.input,
      output: step.output,
      to: target.to,
      kind,
      createdState: false,
    };
    return { cost: rest.cost, path: [transition, ...rest.path] };
  }

  #extend(
    branch: Branch,
    step: Step,
    destination: StateId,
    createdState: boolean,
    cost: number
  ): SubResult | null {
    const entry: ExtensionTransition = {
      from: branch.state,
      input: step.input,
      output: step.output,
      to: destination,
      createdState,
    };
    const synthesized = createdState ? branch.synthesized + 1 : branch.synthesized;
    this.#metrics.observeSynthesized(synthesized);
    const rest = this.#search({
      index: branch.index + 1,
      state: destination,
      extensions: branch.extensions.with(entry),
      synthesized,
    });
    if (!rest) return null;
    const transition: PathTransition = { ...entry, kind: 'extension' };
    return { cost: cost + rest.cost, path: [transition, ...rest.path] };
  }

  /** Predefined states in declaration order, then synthesized ones by tag. */
  #reachableStates(extensions: ExtensionSet): StateId[] {
    const synthesized = extensions
      .synthesizedDestinations()
      .filter((state) => !this.#model.isPredefined(state));
    return [...this.#model.states, ...synthesized];
  }
}

export interface SolveContext {
  /** Machine table (default: the built-in four-state machine) */
  model?: TransducerModel;
  options?: SearchOptions;
  /** Supply a collector to share timings with the caller */
  metrics?: MetricsCollector;
}

function toCompletion(
  start: StateId,
  result: SubResult,
  metrics: MetricsCollector
): Completion {
  const path = [...result.path];
  const extensions: ExtensionTransition[] = path
    .filter((transition) => transition.kind === 'extension')
    .map((transition) => ({
      from: transition.from,
      input: transition.input,
      output: transition.output,
      to: transition.to,
      createdState: transition.createdState,
    }));
  return {
    start,
    cost: result.cost,
    extraTransitions: extensions.length,
    synthesizedStates: extensions.filter((ext) => ext.createdState).length,
    path,
    extensions,
    metrics: metrics.isEnabled() ? metrics.snapshotMetrics() : undefined,
  };
}

/**
 * Find the cheapest completion of the machine that reproduces `steps`,
 * trying every allowed start state. Start states are compared in
 * declaration order; a later one wins only when strictly cheaper.
 */
export function solve(
  steps: readonly Step[],
  context: SolveContext = {}
): Result<Completion, SearchError> {
  const model = context.model ?? defaultModel();
  const options = resolveSearchOptions(model, context.options);
  if (steps.length > options.maxSteps) {
    throw new TraceError({
      message: `Trace has ${steps.length} steps; the limit is ${options.maxSteps}`,
      errorCode: ErrorCode.TRACE_LIMIT_EXCEEDED,
      context: { stepIndex: options.maxSteps },
      suggestions: ['Split the trace or raise maxSteps'],
    });
  }

  const metrics =
    context.metrics ?? new MetricsCollector({ enabled: options.metrics });
  const session = new SearchSession(steps, model, metrics);
  let best: { start: StateId; result: SubResult } | undefined;

  metrics.begin('SEARCH');
  try {
    for (const start of options.startStates) {
      metrics.addStartStateTried();
      const result = session.run(start);
      if (result && (!best || result.cost < best.result.cost)) {
        best = { start, result };
      }
    }
  } finally {
    metrics.setCacheEntries(session.cacheSize);
    metrics.end('SEARCH');
  }

  if (!best) {
    return err(
      new SearchError({
        message: 'No start state yields a completion of the trace',
        context: { startStates: [...options.startStates] },
        suggestions: [
          'Every candidate start state hits a predefined transition whose output contradicts the trace',
        ],
      })
    );
  }
  return ok(toCompletion(best.start, best.result, metrics));
}

/** Throwing variant of solve(). */
export function completeSteps(
  steps: readonly Step[],
  context: SolveContext = {}
): Completion {
  const result = solve(steps, context);
  if (isErr(result)) throw result.error;
  return result.value;
}
