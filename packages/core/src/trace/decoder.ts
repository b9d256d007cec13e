import { TraceError } from '../types/errors.js';
import { isBit, isInputPair, type Step } from '../types/transducer.js';

/** Symbols per step: two input bits followed by one output bit. */
export const STEP_WIDTH = 3;

/** Drop every character outside the {0,1} alphabet. */
export function cleanTrace(raw: string): string {
  return raw.replace(/[^01]/g, '');
}

export function decodeTrace(raw: string): Step[] {
  const symbols = cleanTrace(raw);
  if (symbols.length % STEP_WIDTH !== 0) {
    const remainder = symbols.length % STEP_WIDTH;
    throw new TraceError({
      message: `Input length must be a multiple of ${STEP_WIDTH} (got ${symbols.length})`,
      context: {
        trace: symbols,
        valueExcerpt: symbols.length > 48 ? `${symbols.slice(0, 45)}…` : symbols,
      },
      suggestions: [
        `Remove ${remainder} trailing symbol(s) or add ${STEP_WIDTH - remainder} to complete the last step`,
      ],
    });
  }

  const steps: Step[] = [];
  for (let offset = 0; offset < symbols.length; offset += STEP_WIDTH) {
    const input = symbols.slice(offset, offset + 2);
    const output = symbols.charAt(offset + 2);
    // cleanTrace() guarantees both hold; the guards narrow the types.
    if (!isInputPair(input) || !isBit(output)) continue;
    steps.push({ index: offset / STEP_WIDTH, input, output });
  }
  return steps;
}

/** Render steps back as `iio_iio_…`. */
export function encodeTrace(steps: readonly Step[]): string {
  return steps.map((step) => `${step.input}${step.output}`).join('_');
}
