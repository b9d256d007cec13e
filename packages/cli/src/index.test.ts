import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { describe, it, expect } from 'vitest';

import { ErrorCode, getExitCode } from '@tracefit/core';
import { stripAnsi } from '../../../test/helpers/ansi';
import {
  DEMO_TRACES,
  createProgram,
  main,
  renderCase,
  runDemo,
  runSolve,
  type CliIO,
} from './index.js';

function memoryIO(): {
  io: CliIO;
  stdout: () => string;
  stderr: () => string;
  exitCodes: number[];
} {
  const out: string[] = [];
  const err: string[] = [];
  const exitCodes: number[] = [];
  return {
    io: {
      stdout: (text) => {
        out.push(text);
      },
      stderr: (text) => {
        err.push(text);
      },
      exit: (code) => {
        exitCodes.push(code);
      },
    },
    stdout: () => out.join(''),
    stderr: () => stripAnsi(err.join('')),
    exitCodes,
  };
}

async function run(args: string[]): Promise<ReturnType<typeof memoryIO>> {
  const capture = memoryIO();
  await createProgram(capture.io).parseAsync(args, { from: 'user' });
  return capture;
}

const twoStateMachine = {
  states: {
    A: { '00': { to: 'B', output: '0' } },
    B: {
      '00': { to: 'A', output: '0' },
      '01': { to: 'A', output: '0' },
      '10': { to: 'A', output: '0' },
      '11': { to: 'A', output: '0' },
    },
  },
};

describe('renderCase', () => {
  it('frames a report with a rule and a case header', () => {
    expect(renderCase(2, '010', 'body')).toBe(
      '------------------------------\nTesting case 2:\n010\n\nbody\n\n\n'
    );
  });
});

describe('runDemo', () => {
  it('prints both built-in cases', () => {
    const lines = runDemo().split('\n');

    expect(lines[0]).toBe('-'.repeat(30));
    expect(lines[1]).toBe('Testing case 1:');
    expect(lines[2]).toBe(DEMO_TRACES[0]);
    expect(lines[3]).toBe('');
    expect(lines[4]).toBe('Extra Cost = 5');
    expect(lines[7]).toBe('Path:');
    // 8 path lines, then two blank lines before the next rule
    expect(lines.slice(16, 18)).toEqual(['', '']);
    expect(lines[18]).toBe('-'.repeat(30));
    expect(lines[19]).toBe('Testing case 2:');
    expect(lines[20]).toBe(DEMO_TRACES[1]);
    expect(lines[22]).toMatch(/^Extra Cost = \d+$/);
    expect(lines[25]).toBe('Path:');
    expect(lines).toHaveLength(37);
  });

  it('reports debug output per case when asked', () => {
    const chunks: string[] = [];
    runDemo((text) => chunks.push(text));
    const debug = chunks.join('');
    expect(debug).toContain('[tracefit] case 1: 8 step(s)\n');
    expect(debug).toContain('[tracefit] case 2: 8 step(s)\n');
  });
});

describe('runSolve', () => {
  it('prints a single text report without a case header', () => {
    expect(runSolve(['010'])).toBe(
      'Extra Cost = 1\nExtra Path = 1\nExtra Node = 0\nPath:\nS2 --(01/0)--> S0 (extra)\n'
    );
  });

  it('frames several traces like the demo', () => {
    expect(runSolve(['010', '011'])).toBe(
      renderCase(
        1,
        '010',
        'Extra Cost = 1\nExtra Path = 1\nExtra Node = 0\nPath:\nS2 --(01/0)--> S0 (extra)'
      ) +
        renderCase(
          2,
          '011',
          'Extra Cost = 0\nExtra Path = 0\nExtra Node = 0\nPath:\nS0 --(01/1)--> S1'
        )
    );
  });

  it('emits one JSON document for one trace and an array for several', () => {
    const single: unknown = JSON.parse(runSolve(['010'], { format: 'json' }));
    expect(single).toMatchObject({ trace: '010', summary: { cost: 1 } });

    const many: unknown = JSON.parse(
      runSolve(['010', '011'], { format: 'json' })
    );
    expect(Array.isArray(many) && many.length).toBe(2);
  });

  it('renders markdown reports', () => {
    const markdown = runSolve(['010'], { format: 'markdown' });
    expect(markdown.split('\n')[0]).toBe('# Trace Completion Report – 010');
    expect(markdown.endsWith('\n')).toBe(true);
  });

  it('loads a machine file', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'tracefit-cli-'));
    const machinePath = path.join(dir, 'machine.json');
    try {
      await writeFile(machinePath, JSON.stringify(twoStateMachine), 'utf8');
      expect(runSolve(['011_001'], { machine: machinePath })).toBe(
        [
          'Extra Cost = 3',
          'Extra Path = 2',
          'Extra Node = 1',
          'Path:',
          'A --(01/1)--> N1 (extra, new node)',
          'N1 --(00/1)--> A (extra)',
          '',
        ].join('\n')
      );
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('tracefit program', () => {
  it('runs the demo when no command is given', async () => {
    const capture = await run([]);
    expect(capture.stdout()).toBe(runDemo());
    expect(capture.exitCodes).toEqual([]);
  });

  it('solves traces passed as arguments', async () => {
    const capture = await run(['solve', '010']);
    expect(capture.stdout()).toBe(runSolve(['010']));
    expect(capture.stderr()).toBe('');
  });

  it('writes debug lines to stderr', async () => {
    const capture = await run(['solve', '011', '--debug', '--start', 'S0']);
    const lines = capture.stderr().split('\n');
    expect(lines[0]).toBe('[tracefit] trace: 1 step(s)');
    expect(lines[1]).toBe(
      '[tracefit] effective options: {"startStates":["S0"],"maxSteps":512,"metrics":true}'
    );
  });

  it('exits with the trace error code on a malformed trace', async () => {
    const capture = await run(['solve', '01']);
    expect(capture.exitCodes).toEqual([
      getExitCode(ErrorCode.INVALID_TRACE_LENGTH),
    ]);
    expect(capture.stderr().split('\n')[0]).toBe(
      '✖ Error E001: Input length must be a multiple of 3 (got 2)'
    );
    expect(capture.stdout()).toBe('');
  });

  it('exits with the search error code when no start state works', async () => {
    const capture = await run(['solve', '010', '--start', 'S0']);
    expect(capture.exitCodes).toEqual([30]);
    expect(capture.stderr().split('\n')[0]).toBe(
      '✖ Error E200: No start state yields a completion of the trace'
    );
  });

  it('exits with the configuration code on bad flags', async () => {
    const badFormat = await run(['solve', '010', '--format', 'yaml']);
    expect(badFormat.exitCodes).toEqual([50]);
    expect(badFormat.stderr()).toContain('Error E300: Unknown output format "yaml"');

    const missing = await run(['solve', '010', '--machine', 'no-such-file.json']);
    expect(missing.exitCodes).toEqual([50]);
    expect(missing.stderr()).toContain('Machine file not found: ');

    const tooLong = await run(['solve', '011_011', '--max-steps', '1']);
    expect(tooLong.exitCodes).toEqual([11]);
  });

  it('writes the serialized error under --format json', async () => {
    const capture = await run(['solve', '01', '--format', 'json']);
    expect(capture.exitCodes).toEqual([10]);
    expect(capture.stdout()).toBe('');
    const parsed: unknown = JSON.parse(capture.stderr());
    expect(parsed).toMatchObject({
      name: 'TraceError',
      errorCode: ErrorCode.INVALID_TRACE_LENGTH,
      message: 'Input length must be a multiple of 3 (got 2)',
      context: { trace: '01' },
    });
  });

  it('exits with the machine code on an invalid machine file', async () => {
    const dir = await mkdtemp(path.join(os.tmpdir(), 'tracefit-cli-'));
    const machinePath = path.join(dir, 'broken.json');
    try {
      await writeFile(machinePath, '{"states":', 'utf8');
      const capture = await run(['solve', '011', '--machine', machinePath]);
      expect(capture.exitCodes).toEqual([21]);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  });
});

describe('main', () => {
  it('routes commander usage errors through the injected exit', async () => {
    const unknown = memoryIO();
    await main(['node', 'tracefit', 'solve', '--bogus', '001'], unknown.io);
    expect(unknown.exitCodes).toEqual([1]);
    expect(unknown.stderr().split('\n')[0]).toBe("error: unknown option '--bogus'");

    const missing = memoryIO();
    await main(['node', 'tracefit', 'solve'], missing.io);
    expect(missing.exitCodes).toEqual([1]);
    expect(missing.stderr()).toBe("error: missing required argument 'trace'\n");
  });

  it('exits 0 after printing the version', async () => {
    const capture = memoryIO();
    await main(['node', 'tracefit', '--version'], capture.io);
    expect(capture.stdout()).toBe('0.1.0\n');
    expect(capture.exitCodes).toEqual([0]);
  });
});
