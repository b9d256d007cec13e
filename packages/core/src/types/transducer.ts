/**
 * Core transducer vocabulary shared by the model, decoder and search engine.
 */

export type Bit = '0' | '1';

/** Two-symbol input consumed by one transition. */
export type InputPair = `${Bit}${Bit}`;

export type StateId = string;

export const INPUT_PAIRS: readonly InputPair[] = ['00', '01', '10', '11'];

export interface TransitionTarget {
  to: StateId;
  output: Bit;
}

export interface Transition extends TransitionTarget {
  from: StateId;
  input: InputPair;
}

/** One unit of the trace: input pair plus the output it must produce. */
export interface Step {
  index: number;
  input: InputPair;
  output: Bit;
}

/**
 * JSON shape of a machine table. States are listed in declaration order,
 * which is also the order the search tries them as start states; names are
 * identifiers (see STATE_NAME_PATTERN) so key order stays declaration order.
 */
export interface MachineDefinition {
  states: Record<StateId, Partial<Record<InputPair, TransitionTarget>>>;
}

export function isBit(value: string): value is Bit {
  return value === '0' || value === '1';
}

export function isInputPair(value: string): value is InputPair {
  return value.length === 2 && isBit(value.charAt(0)) && isBit(value.charAt(1));
}
