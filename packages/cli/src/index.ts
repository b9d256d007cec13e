#!/usr/bin/env node

// CLI entry point
// - `tracefit` / `tracefit demo` runs the two built-in sample traces and prints a
//   text report for each, framed by a rule and a "Testing case <n>:" header.
// - `tracefit solve <trace...>` completes user traces against the built-in machine
//   or a JSON machine file, and prints text, markdown or JSON reports.

import { Command, CommanderError } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  ErrorPresenter,
  InternalError,
  completeTrace,
  isTracefitError,
  parseMachine,
  type TracefitError,
  type TransducerModel,
} from '@tracefit/core';
import {
  buildReport,
  renderJsonReport,
  renderMarkdownReport,
  renderTextReport,
  type Report,
} from '@tracefit/reporter';
import { printSearchDebug } from './debug.js';
import {
  parseSearchOptions,
  resolveOutputFormat,
  type CliOptions,
  type OutputFormat,
} from './flags.js';
import { renderCLIView } from './render.js';

export const DEMO_TRACES = [
  '001_010_010_101_100_001_110_110',
  '111_010_000_100_110_101_110_000',
] as const;

const RULE = '-'.repeat(30);

/** Where the CLI writes; tests supply an in-memory implementation. */
export interface CliIO {
  stdout(text: string): void;
  stderr(text: string): void;
  exit(code: number): void;
}

export const processIO: CliIO = {
  stdout: (text) => {
    process.stdout.write(text);
  },
  stderr: (text) => {
    process.stderr.write(text);
  },
  exit: (code) => {
    process.exit(code);
  },
};

/** Rule, case header, raw trace, blank line, report, then two blank lines. */
export function renderCase(caseNumber: number, raw: string, body: string): string {
  return `${RULE}\nTesting case ${caseNumber}:\n${raw}\n\n${body}\n\n\n`;
}

type DebugSink = (text: string) => void;

export function runDemo(debug?: DebugSink): string {
  return DEMO_TRACES.map((raw, i) => {
    const result = completeTrace(raw);
    if (debug) printSearchDebug(debug, `case ${i + 1}`, result);
    const report = buildReport({
      caseId: `case ${i + 1}`,
      trace: raw,
      steps: result.steps,
      completion: result.completion,
    });
    return renderCase(i + 1, raw, renderTextReport(report));
  }).join('');
}

function loadMachineFile(file: string): TransducerModel {
  const abs = path.resolve(process.cwd(), file);
  if (!fs.existsSync(abs)) {
    throw new ConfigError({
      message: `Machine file not found: ${abs}`,
      context: { setting: 'machine' },
    });
  }
  return parseMachine(fs.readFileSync(abs, 'utf8'));
}

function formatReports(reports: Report[], format: OutputFormat): string {
  const [single] = reports;
  if (format === 'json') {
    return reports.length === 1 && single
      ? renderJsonReport(single)
      : `${JSON.stringify(reports, null, 2)}\n`;
  }
  if (format === 'markdown') {
    return `${reports.map(renderMarkdownReport).join('\n\n')}\n`;
  }
  if (reports.length === 1 && single) {
    return `${renderTextReport(single)}\n`;
  }
  return reports
    .map((report, i) => renderCase(i + 1, report.trace, renderTextReport(report)))
    .join('');
}

export function runSolve(
  traces: readonly string[],
  options: CliOptions = {},
  debug?: DebugSink
): string {
  const format = resolveOutputFormat(options.format);
  const search = parseSearchOptions(options);
  const machine = options.machine ? loadMachineFile(options.machine) : undefined;

  const reports = traces.map((raw, i) => {
    const label = traces.length > 1 ? `case ${i + 1}` : undefined;
    const result = completeTrace(raw, { machine, search });
    if (debug) printSearchDebug(debug, label ?? 'trace', result, search);
    return buildReport({
      caseId: label,
      trace: raw,
      steps: result.steps,
      completion: result.completion,
    });
  });
  return formatReports(reports, format);
}

/**
 * Present an error on stderr and exit with its code. `json` writes the
 * serialized error so scripts reading `--format json` can parse failures too.
 */
export function handleCliError(
  err: unknown,
  io: CliIO = processIO,
  format: 'text' | 'json' = 'text'
): void {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: TracefitError;
  if (isTracefitError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      cause: err instanceof Error ? err : undefined,
    });
  }

  if (format === 'json') {
    io.stderr(`${JSON.stringify(presenter.formatForJSON(error), null, 2)}\n`);
  } else {
    io.stderr(`${renderCLIView(presenter.formatForCLI(error))}\n`);
  }
  io.exit(error.getExitCode());
}

export function createProgram(io: CliIO = processIO): Command {
  const program = new Command();

  program
    .name('tracefit')
    .description(
      'Extend a partial transducer at minimum cost so it reproduces a trace'
    )
    .version('0.1.0')
    // usage errors throw instead of exiting; subcommands inherit this
    .exitOverride()
    .configureOutput({
      writeOut: (text) => io.stdout(text),
      writeErr: (text) => io.stderr(text),
    });

  program
    .command('demo', { isDefault: true })
    .description('Run the built-in sample traces')
    .option('--debug', 'Print effective options and search metrics to stderr')
    .action((options: Pick<CliOptions, 'debug'>) => {
      try {
        io.stdout(runDemo(options.debug ? io.stderr : undefined));
      } catch (err: unknown) {
        handleCliError(err, io);
      }
    });

  program
    .command('solve')
    .description('Complete one or more traces')
    .argument(
      '<trace...>',
      'traces of 3-symbol steps (2 input bits, 1 output bit); other characters are ignored'
    )
    .option('-f, --format <format>', 'Output format: text|markdown|json', 'text')
    .option('-m, --machine <file>', 'JSON machine definition file')
    .option('-s, --start <states>', 'Comma-separated candidate start states')
    .option('--max-steps <number>', 'Longest accepted trace, in steps')
    .option('--no-metrics', 'Disable search metrics')
    .option('--debug', 'Print effective options and search metrics to stderr')
    .action((traces: string[], options: CliOptions) => {
      try {
        io.stdout(runSolve(traces, options, options.debug ? io.stderr : undefined));
      } catch (err: unknown) {
        handleCliError(err, io, options.format === 'json' ? 'json' : 'text');
      }
    });

  return program;
}

export async function main(
  argv: string[] = process.argv,
  io: CliIO = processIO
): Promise<void> {
  try {
    await createProgram(io).parseAsync(argv);
  } catch (err: unknown) {
    // commander has already written its own message (or help/version text)
    if (err instanceof CommanderError) {
      io.exit(err.exitCode);
      return;
    }
    handleCliError(err, io);
  }
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
