import type { CLIErrorView } from '@tracefit/core';

const RED = '\u001B[31m';
const DIM = '\u001B[2m';
const RESET = '\u001B[0m';

function paint(text: string, color: string, enabled: boolean): string {
  return enabled ? `${color}${text}${RESET}` : text;
}

/**
 * Greedy word wrap. The first line starts with `lead`, continuation lines
 * with `hang`; a single over-long word is never split.
 */
function wrap(text: string, width: number, lead: string, hang: string): string[] {
  const out: string[] = [];
  let current = lead;
  let started = false;
  for (const word of text.split(/\s+/).filter(Boolean)) {
    const candidate = started ? `${current} ${word}` : `${current}${word}`;
    if (started && candidate.length > width) {
      out.push(current);
      current = `${hang}${word}`;
    } else {
      current = candidate;
    }
    started = true;
  }
  if (started) out.push(current);
  return out;
}

/**
 * Error block written to stderr:
 *
 *   ✖ Error E001: Input length must be a multiple of 3 (got 4)
 *     Location: step 2 in state S1
 *     Value: 0101
 *     Suggestions:
 *       - Remove 1 trailing symbol(s) or add 2 to complete the last step
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth > 0 ? view.terminalWidth : 80;
  const lines = [paint(`✖ ${view.title}`, RED, view.colors)];

  if (view.location) {
    lines.push(...wrap(view.location, width, '  ', '  '));
  }
  if (view.excerpt) {
    lines.push(...wrap(`Value: ${view.excerpt}`, width, '  ', '    '));
  }
  if (view.suggestions.length > 0) {
    lines.push(paint('  Suggestions:', DIM, view.colors));
    for (const hint of view.suggestions) {
      lines.push(...wrap(hint, width, '    - ', '      '));
    }
  }

  return lines.join('\n');
}
