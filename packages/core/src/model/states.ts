import type { StateId } from '../types/transducer.js';

const SYNTHESIZED_PREFIX = 'N';
const SYNTHESIZED_RE = /^N(\d+)$/;

/** Label of the k-th state created during one search (1-based). */
export function synthesizedStateId(tag: number): StateId {
  return `${SYNTHESIZED_PREFIX}${tag}`;
}

export function synthesizedTag(id: StateId): number | undefined {
  const match = SYNTHESIZED_RE.exec(id);
  if (!match?.[1]) return undefined;
  return Number.parseInt(match[1], 10);
}

export function isSynthesizedStateId(id: StateId): boolean {
  return synthesizedTag(id) !== undefined;
}
