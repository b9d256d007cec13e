import type { TransducerModel } from '../model/transducer.js';
import type {
  Bit,
  InputPair,
  StateId,
  Step,
  TransitionTarget,
} from '../types/transducer.js';
import type { Completion } from './types.js';

export interface ReplayResult {
  outputs: Bit[];
  /** Start state followed by the state after each consumed input. */
  states: StateId[];
  /** False when some (state, input) had no transition in the completed machine. */
  complete: boolean;
}

function extensionTable(
  completion: Completion
): Map<string, TransitionTarget> {
  const table = new Map<string, TransitionTarget>();
  for (const ext of completion.extensions) {
    table.set(`${ext.from}|${ext.input}`, { to: ext.to, output: ext.output });
  }
  return table;
}

/**
 * Run the completed machine (predefined table plus the completion's
 * extensions) from the completion's start state.
 */
export function replayCompletion(
  model: TransducerModel,
  completion: Completion,
  inputs: readonly InputPair[]
): ReplayResult {
  const added = extensionTable(completion);
  const outputs: Bit[] = [];
  const states: StateId[] = [completion.start];
  let current = completion.start;

  for (const input of inputs) {
    const target =
      model.lookup(current, input) ?? added.get(`${current}|${input}`);
    if (!target) {
      return { outputs, states, complete: false };
    }
    outputs.push(target.output);
    states.push(target.to);
    current = target.to;
  }
  return { outputs, states, complete: true };
}

/**
 * Check a completion against the trace it claims to reproduce: outputs,
 * path continuity, no overwritten predefined transitions and the cost
 * identity.
 */
export function verifyCompletion(
  model: TransducerModel,
  completion: Completion,
  steps: readonly Step[]
): boolean {
  const seen = new Set<string>();
  for (const ext of completion.extensions) {
    const key = `${ext.from}|${ext.input}`;
    if (model.has(ext.from, ext.input) || seen.has(key)) return false;
    seen.add(key);
  }

  const replay = replayCompletion(
    model,
    completion,
    steps.map((step) => step.input)
  );
  if (!replay.complete) return false;
  if (completion.path.length !== steps.length) return false;

  const outputsMatch = steps.every(
    (step, i) => replay.outputs[i] === step.output
  );
  const pathChains = completion.path.every(
    (transition, i) =>
      transition.from === replay.states[i] &&
      transition.to === replay.states[i + 1]
  );
  const costMatches =
    completion.cost ===
      completion.extraTransitions + completion.synthesizedStates &&
    completion.extraTransitions === completion.extensions.length;

  return outputsMatch && pathChains && costMatches;
}
