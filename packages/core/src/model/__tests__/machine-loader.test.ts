import { describe, it, expect } from 'vitest';

import { ErrorCode } from '../../errors/codes';
import { MachineDefinitionError } from '../../types/errors';
import { loadMachine, parseMachine } from '../machine-loader';

function captureError(fn: () => unknown): MachineDefinitionError {
  try {
    fn();
  } catch (error) {
    if (error instanceof MachineDefinitionError) return error;
    throw error;
  }
  throw new Error('expected MachineDefinitionError');
}

describe('loadMachine', () => {
  it('builds a model from a valid definition', () => {
    const model = loadMachine({
      states: {
        A: { '00': { to: 'B', output: '1' } },
        B: {},
      },
    });
    expect(model.states).toEqual(['A', 'B']);
    expect(model.lookup('A', '00')).toEqual({ to: 'B', output: '1' });
  });

  it('rejects structural problems with Ajv messages', () => {
    const error = captureError(() =>
      loadMachine({ states: { A: { '0x': { to: 'A', output: '1' } } } })
    );
    expect(error.errorCode).toBe(ErrorCode.INVALID_MACHINE_DEFINITION);
    expect(error.message).toBe(
      'Machine definition does not match the expected shape'
    );
    expect(error.suggestions?.length).toBeGreaterThan(0);
  });

  it('rejects bad output symbols', () => {
    const error = captureError(() =>
      loadMachine({ states: { A: { '01': { to: 'A', output: '2' } } } })
    );
    expect(error.suggestions).toContain(
      '/states/A/01/output must be equal to one of the allowed values'
    );
  });

  it('rejects an empty state table', () => {
    expect(() => loadMachine({ states: {} })).toThrow(MachineDefinitionError);
  });

  it('rejects undeclared destinations', () => {
    const error = captureError(() =>
      loadMachine({ states: { A: { '01': { to: 'Z', output: '1' } } } })
    );
    expect(error.message).toBe('Machine definition is inconsistent');
    expect(error.suggestions).toEqual([
      '/states/A/01/to references undeclared state "Z"',
    ]);
  });

  it('rejects state names that are not identifiers', () => {
    const error = captureError(() =>
      loadMachine({ states: { 'A:01': {}, B: {} } })
    );
    expect(error.errorCode).toBe(ErrorCode.INVALID_MACHINE_DEFINITION);
    expect(error.suggestions).toContain('/states property name must be valid');

    const target = captureError(() =>
      loadMachine({ states: { A: { '01': { to: 'B/0;A', output: '1' } } } })
    );
    expect(target.suggestions).toContain(
      '/states/A/01/to must match pattern "^[A-Za-z_][A-Za-z0-9_]*$"'
    );
  });

  it('refuses integer-like names that would reorder the start states', () => {
    expect(() => loadMachine({ states: { B: {}, '2': {} } })).toThrow(
      MachineDefinitionError
    );
    expect(loadMachine({ states: { B: {}, A: {}, s2: {} } }).states).toEqual([
      'B',
      'A',
      's2',
    ]);
  });

  it('reserves N<number> ids for synthesized states', () => {
    const error = captureError(() => loadMachine({ states: { N1: {} } }));
    expect(error.suggestions).toEqual([
      '/states/N1 uses a name reserved for synthesized states (N<number>)',
    ]);
  });
});

describe('parseMachine', () => {
  it('parses JSON text', () => {
    const model = parseMachine('{"states":{"A":{"11":{"to":"A","output":"0"}}}}');
    expect(model.lookup('A', '11')).toEqual({ to: 'A', output: '0' });
  });

  it('reports invalid JSON with its own code', () => {
    const error = captureError(() => parseMachine('{states'));
    expect(error.errorCode).toBe(ErrorCode.MACHINE_PARSE_FAILED);
    expect(error.getExitCode()).toBe(21);
    expect(error.message.startsWith('Machine file is not valid JSON: ')).toBe(
      true
    );
  });
});
