import type { Report, ReportStep } from '../model/report.js';

function annotation(step: ReportStep): string {
  if (!step.extra) return '';
  return step.newNode ? ' (extra, new node)' : ' (extra)';
}

export function renderPathLine(step: ReportStep): string {
  return `${step.from} --(${step.input}/${step.output})--> ${step.to}${annotation(step)}`;
}

/**
 * Plain-text summary: the three cost lines, then one line per consumed step.
 */
export function renderTextReport(report: Report): string {
  const { summary } = report;
  const lines = [
    `Extra Cost = ${summary.cost}`,
    `Extra Path = ${summary.extraTransitions}`,
    `Extra Node = ${summary.synthesizedStates}`,
    'Path:',
    ...report.path.map(renderPathLine),
  ];
  return lines.join('\n');
}
