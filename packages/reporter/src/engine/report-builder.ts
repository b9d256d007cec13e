import { createRequire } from 'node:module';
import {
  encodeTrace,
  type Completion,
  type PathTransition,
  type Step,
} from '@tracefit/core';

import {
  computeStepSummary,
  type Report,
  type ReportStep,
} from '../model/report.js';

const require = createRequire(import.meta.url);

function readPackageField(
  pkg: unknown,
  field: 'name' | 'version'
): string | undefined {
  if (typeof pkg !== 'object' || pkg === null || !(field in pkg)) {
    return undefined;
  }
  const value: unknown = Reflect.get(pkg, field);
  return typeof value === 'string' ? value : undefined;
}

const reporterPkg: unknown = require('../../package.json');
const corePkg: unknown = require('@tracefit/core/package.json');

const TOOL_NAME = readPackageField(reporterPkg, 'name') ?? 'tracefit-reporter';
const TOOL_VERSION = readPackageField(reporterPkg, 'version') ?? '0.0.0';
const ENGINE_VERSION = readPackageField(corePkg, 'version');

export interface BuildReportInput {
  caseId?: string;
  /** Trace text as the user supplied it. */
  trace: string;
  steps: readonly Step[];
  completion: Completion;
  /** ISO timestamp override (default: now). */
  timestamp?: string;
}

export function buildReport(input: BuildReportInput): Report {
  const { completion } = input;
  const path = completion.path.map(annotateStep);
  const metrics = completion.metrics;

  return {
    caseId: input.caseId,
    trace: input.trace,
    normalizedTrace: encodeTrace(input.steps),
    meta: {
      toolName: TOOL_NAME,
      toolVersion: TOOL_VERSION,
      engineVersion: ENGINE_VERSION,
      timestamp: input.timestamp ?? new Date().toISOString(),
    },
    summary: {
      start: completion.start,
      cost: completion.cost,
      extraTransitions: completion.extraTransitions,
      synthesizedStates: completion.synthesizedStates,
      ...computeStepSummary(path),
      timings: metrics
        ? { decodeMs: metrics.decodeMs, searchMs: metrics.searchMs }
        : undefined,
    },
    path,
    extensions: completion.extensions.map((ext) => ({ ...ext })),
    metrics,
  } satisfies Report;
}

function annotateStep(transition: PathTransition, index: number): ReportStep {
  const extra = transition.kind === 'extension';
  return {
    index,
    from: transition.from,
    input: transition.input,
    output: transition.output,
    to: transition.to,
    kind: transition.kind,
    extra,
    newNode: extra && transition.createdState,
  };
}
