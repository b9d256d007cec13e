import { describe, expect, it } from 'vitest';
import { completeSteps, decodeTrace } from '@tracefit/core';

import { buildReport } from './report-builder.js';

describe('buildReport', () => {
  const trace = '010_100_010';
  const steps = decodeTrace(trace);
  const completion = completeSteps(steps);
  const report = buildReport({
    caseId: 'case-1',
    trace,
    steps,
    completion,
    timestamp: '2024-01-01T00:00:00.000Z',
  });

  it('copies the cost summary from the completion', () => {
    expect(report.caseId).toBe('case-1');
    expect(report.normalizedTrace).toBe('010_100_010');
    expect(report.summary).toMatchObject({
      start: 'S2',
      stepCount: 3,
      cost: 1,
      extraTransitions: 1,
      synthesizedStates: 0,
      predefinedSteps: 1,
      reusedSteps: 1,
    });
  });

  it('marks only freshly added transitions as extra', () => {
    expect(report.path.map((step) => [step.kind, step.extra])).toEqual([
      ['extension', true],
      ['predefined', false],
      ['reused', false],
    ]);
    expect(report.path.map((step) => step.index)).toEqual([0, 1, 2]);
  });

  it('carries metadata and timings', () => {
    expect(report.meta.toolName).toBe('@tracefit/reporter');
    expect(report.meta.timestamp).toBe('2024-01-01T00:00:00.000Z');
    expect(report.summary.timings?.searchMs).toBe(completion.metrics?.searchMs);
    expect(report.metrics?.startStatesTried).toBe(4);
  });

  it('omits timings when metrics were disabled', () => {
    const quiet = completeSteps(steps, { options: { metrics: false } });
    const bare = buildReport({ trace, steps, completion: quiet });
    expect(bare.summary.timings).toBeUndefined();
    expect(bare.metrics).toBeUndefined();
    expect(bare.caseId).toBeUndefined();
  });
});
