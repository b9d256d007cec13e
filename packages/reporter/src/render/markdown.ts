import type { ExtensionTransition } from '@tracefit/core';

import type { MetricsSnapshot, Report, ReportStep } from '../model/report.js';

function renderPathTable(path: ReportStep[]): string[] {
  if (!path.length) {
    return ['Empty trace: no steps consumed.'];
  }
  const header = '| # | From | Input/Output | To | Kind |';
  const divider = '|---|---|---|---|---|';
  const rows = path.map((step) => {
    const kind = step.newNode ? 'extension (new node)' : step.kind;
    return `| ${step.index} | ${step.from} | ${step.input}/${step.output} | ${step.to} | ${kind} |`;
  });
  return [header, divider, ...rows];
}

function renderExtensionsTable(extensions: ExtensionTransition[]): string[] {
  if (!extensions.length) {
    return ['No transitions added.'];
  }
  const header = '| From | Input | Output | To | New state |';
  const divider = '|---|---|---|---|---|';
  const rows = extensions.map(
    (ext) =>
      `| ${ext.from} | ${ext.input} | ${ext.output} | ${ext.to} | ${ext.createdState ? 'yes' : 'no'} |`
  );
  return [header, divider, ...rows];
}

function renderMetrics(metrics: MetricsSnapshot): string[] {
  const rows: [string, number][] = [
    ['decode (ms)', metrics.decodeMs],
    ['search (ms)', metrics.searchMs],
    ['nodes expanded', metrics.nodesExpanded],
    ['cache hits', metrics.cacheHits],
    ['cache entries', metrics.cacheEntries],
    ['start states tried', metrics.startStatesTried],
    ['synthesized peak', metrics.synthesizedPeak],
  ];
  return [
    '| Metric | Value |',
    '|---|---|',
    ...rows.map(([label, value]) => `| ${label} | ${value} |`),
  ];
}

export function renderMarkdownReport(report: Report): string {
  const lines: string[] = [];
  const summary = report.summary;

  lines.push(
    `# Trace Completion Report – ${report.caseId ?? report.normalizedTrace}`,
    ''
  );
  lines.push(`- Tool: ${report.meta.toolName} ${report.meta.toolVersion}`);
  lines.push(`- Engine: ${report.meta.engineVersion ?? 'n/a'}`);
  lines.push(`- Timestamp: ${report.meta.timestamp}`);
  lines.push(`- Trace: \`${report.normalizedTrace}\``);
  lines.push(`- Steps: ${summary.stepCount}`);
  lines.push(`- Start state: ${summary.start}`);
  lines.push(`- Extra cost: ${summary.cost}`);
  lines.push(
    `  - added transitions: ${summary.extraTransitions}`,
    `  - synthesized states: ${summary.synthesizedStates}`,
    `  - predefined steps: ${summary.predefinedSteps}`,
    `  - reused steps: ${summary.reusedSteps}`
  );

  lines.push('', '## Path', '');
  lines.push(...renderPathTable(report.path));

  lines.push('', '## Added Transitions', '');
  lines.push(...renderExtensionsTable(report.extensions));

  if (report.metrics) {
    lines.push('', '## Search Metrics', '');
    lines.push(...renderMetrics(report.metrics));
  }

  return lines.join('\n');
}
