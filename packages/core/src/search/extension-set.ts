import { synthesizedTag } from '../model/states.js';
import { InternalError } from '../types/errors.js';
import type {
  InputPair,
  StateId,
  TransitionTarget,
} from '../types/transducer.js';
import type { ExtensionTransition } from './types.js';

interface ExtensionNode {
  readonly entry: ExtensionTransition;
  readonly parent: ExtensionNode | undefined;
}

type EntryTuple = readonly [StateId, InputPair, StateId, string];

function entryTuple(entry: ExtensionTransition): EntryTuple {
  return [entry.from, entry.input, entry.to, entry.output];
}

function compareTuples(a: EntryTuple, b: EntryTuple): number {
  for (let i = 0; i < a.length; i += 1) {
    const left = a[i] ?? '';
    const right = b[i] ?? '';
    if (left !== right) return left < right ? -1 : 1;
  }
  return 0;
}

/**
 * Persistent set of transitions added during one search branch.
 *
 * Each with() call returns a new set that shares its ancestors' nodes, so
 * sibling branches never observe each other's additions. `key` is the
 * canonical, order-independent encoding used in memo keys.
 */
export class ExtensionSet {
  static readonly EMPTY = new ExtensionSet(undefined, 0);

  readonly size: number;
  readonly #head: ExtensionNode | undefined;
  #key: string | undefined;

  private constructor(head: ExtensionNode | undefined, size: number) {
    this.#head = head;
    this.size = size;
  }

  get(from: StateId, input: InputPair): TransitionTarget | undefined {
    for (let node = this.#head; node; node = node.parent) {
      if (node.entry.from === from && node.entry.input === input) {
        return { to: node.entry.to, output: node.entry.output };
      }
    }
    return undefined;
  }

  has(from: StateId, input: InputPair): boolean {
    return this.get(from, input) !== undefined;
  }

  with(entry: ExtensionTransition): ExtensionSet {
    if (this.has(entry.from, entry.input)) {
      throw new InternalError({
        message: `Extension for (${entry.from}, ${entry.input}) already exists`,
        context: { state: entry.from },
      });
    }
    return new ExtensionSet({ entry, parent: this.#head }, this.size + 1);
  }

  /** Entries in insertion order. */
  entries(): ExtensionTransition[] {
    const out: ExtensionTransition[] = [];
    for (let node = this.#head; node; node = node.parent) {
      out.push(node.entry);
    }
    return out.reverse();
  }

  /** Synthesized destinations ordered by tag. */
  synthesizedDestinations(): StateId[] {
    const tagged = new Map<number, StateId>();
    for (let node = this.#head; node; node = node.parent) {
      const tag = synthesizedTag(node.entry.to);
      if (tag !== undefined) tagged.set(tag, node.entry.to);
    }
    return [...tagged.entries()].sort((a, b) => a[0] - b[0]).map(([, id]) => id);
  }

  get key(): string {
    if (this.#key === undefined) {
      const tuples: EntryTuple[] = [];
      for (let node = this.#head; node; node = node.parent) {
        tuples.push(entryTuple(node.entry));
      }
      // JSON keeps state names containing separators distinct
      this.#key = JSON.stringify(tuples.sort(compareTuples));
    }
    return this.#key;
  }
}
