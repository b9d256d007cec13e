/**
 * Data model for the reporting layer. A Report is a self-contained,
 * serializable view of one completed trace; renderers only read it.
 */
import type {
  Bit,
  ExtensionTransition,
  InputPair,
  MetricsSnapshot,
  StateId,
  TransitionKind,
} from '@tracefit/core';

export type { MetricsSnapshot };

/** One consumed step with its annotation. */
export interface ReportStep {
  index: number;
  from: StateId;
  input: InputPair;
  output: Bit;
  to: StateId;
  kind: TransitionKind;
  /** Added at this step (reused extensions are not extra). */
  extra: boolean;
  /** Added at this step with a freshly synthesized destination. */
  newNode: boolean;
}

export interface ReportMeta {
  toolName: string;
  toolVersion: string;
  engineVersion?: string;
  timestamp: string;
}

export interface ReportSummary {
  start: StateId;
  stepCount: number;
  cost: number;
  extraTransitions: number;
  synthesizedStates: number;
  predefinedSteps: number;
  reusedSteps: number;
  timings?: {
    decodeMs: number;
    searchMs: number;
  };
}

/**
 * Public, stable representation of a completed trace.
 */
export interface Report {
  /** Label for the run (demo case number, file name, ...). */
  caseId?: string;
  /** Trace as supplied by the caller. */
  trace: string;
  /** Cleaned trace with `_` between steps. */
  normalizedTrace: string;
  meta: ReportMeta;
  summary: ReportSummary;
  path: ReportStep[];
  /** Transitions added to the machine, in path order. */
  extensions: ExtensionTransition[];
  metrics?: MetricsSnapshot;
}

/** Step counters derived from the annotated path. */
export function computeStepSummary(
  path: readonly ReportStep[]
): Pick<ReportSummary, 'stepCount' | 'predefinedSteps' | 'reusedSteps'> {
  let predefinedSteps = 0;
  let reusedSteps = 0;

  for (const step of path) {
    if (step.kind === 'predefined') {
      predefinedSteps += 1;
    } else if (step.kind === 'reused') {
      reusedSteps += 1;
    }
  }

  return { stepCount: path.length, predefinedSteps, reusedSteps };
}
