import {
  INPUT_PAIRS,
  type InputPair,
  type MachineDefinition,
  type StateId,
  type Transition,
  type TransitionTarget,
} from '../types/transducer.js';

/**
 * Built-in four-state table used when no machine file is supplied.
 */
export const DEFAULT_MACHINE = {
  states: {
    S0: {
      '01': { to: 'S1', output: '1' },
      '11': { to: 'S1', output: '0' },
      '10': { to: 'S2', output: '0' },
    },
    S1: {
      '01': { to: 'S3', output: '1' },
    },
    S2: {
      '00': { to: 'S3', output: '1' },
      '11': { to: 'S1', output: '0' },
      '10': { to: 'S3', output: '0' },
    },
    S3: {
      '01': { to: 'S0', output: '1' },
    },
  },
} satisfies MachineDefinition;

/**
 * Immutable predefined transition table. Built once, consulted by every
 * search; lookups never fail, they only miss.
 */
export class TransducerModel {
  readonly states: readonly StateId[];
  readonly #table: ReadonlyMap<StateId, ReadonlyMap<InputPair, TransitionTarget>>;

  private constructor(
    states: readonly StateId[],
    table: ReadonlyMap<StateId, ReadonlyMap<InputPair, TransitionTarget>>
  ) {
    this.states = states;
    this.#table = table;
  }

  /**
   * Build a model without validation. Use loadMachine() for untrusted input.
   */
  static fromDefinition(definition: MachineDefinition): TransducerModel {
    const states: StateId[] = [];
    const table = new Map<StateId, Map<InputPair, TransitionTarget>>();
    for (const [state, row] of Object.entries(definition.states)) {
      states.push(state);
      const entries = new Map<InputPair, TransitionTarget>();
      for (const input of INPUT_PAIRS) {
        const target = row[input];
        if (target) {
          entries.set(input, { to: target.to, output: target.output });
        }
      }
      table.set(state, entries);
    }
    return new TransducerModel(Object.freeze(states), table);
  }

  lookup(state: StateId, input: InputPair): TransitionTarget | undefined {
    return this.#table.get(state)?.get(input);
  }

  has(state: StateId, input: InputPair): boolean {
    return this.#table.get(state)?.has(input) ?? false;
  }

  isPredefined(state: StateId): boolean {
    return this.#table.has(state);
  }

  get transitionCount(): number {
    let count = 0;
    for (const row of this.#table.values()) count += row.size;
    return count;
  }

  /** All predefined transitions, by state declaration order then input. */
  transitions(): Transition[] {
    const out: Transition[] = [];
    for (const state of this.states) {
      for (const input of INPUT_PAIRS) {
        const target = this.lookup(state, input);
        if (target) out.push({ from: state, input, ...target });
      }
    }
    return out;
  }

  toDefinition(): MachineDefinition {
    const states: MachineDefinition['states'] = {};
    for (const state of this.states) {
      const row: Partial<Record<InputPair, TransitionTarget>> = {};
      for (const input of INPUT_PAIRS) {
        const target = this.lookup(state, input);
        if (target) row[input] = { ...target };
      }
      states[state] = row;
    }
    return { states };
  }
}

export function defaultModel(): TransducerModel {
  return TransducerModel.fromDefinition(DEFAULT_MACHINE);
}
