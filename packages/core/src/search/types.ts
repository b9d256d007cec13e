import type { MetricsSnapshot } from '../util/metrics.js';
import type { Bit, InputPair, StateId } from '../types/transducer.js';

/**
 * How a path step was satisfied:
 * - predefined: the machine table already had the transition
 * - reused: an extension added earlier on the same branch
 * - extension: a transition added at this step
 */
export type TransitionKind = 'predefined' | 'reused' | 'extension';

export interface PathTransition {
  from: StateId;
  input: InputPair;
  output: Bit;
  to: StateId;
  kind: TransitionKind;
  /** Only true for extensions whose destination was synthesized here. */
  createdState: boolean;
}

export interface ExtensionTransition {
  from: StateId;
  input: InputPair;
  output: Bit;
  to: StateId;
  createdState: boolean;
}

export interface Completion {
  start: StateId;
  /** extraTransitions + synthesizedStates */
  cost: number;
  extraTransitions: number;
  synthesizedStates: number;
  path: PathTransition[];
  /** Transitions added to the machine, in the order the path added them. */
  extensions: ExtensionTransition[];
  metrics?: MetricsSnapshot;
}
