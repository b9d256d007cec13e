import { describe, test, expect } from 'vitest';
import { ErrorCode, EXIT_CODES, getExitCode, type Severity } from '../codes';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    const unique = new Set(codes);
    expect(unique.size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    const mappedCodes = Object.keys(EXIT_CODES);
    expect(mappedCodes.length).toBe(enumCodes.length);
    for (const code of enumCodes) {
      expect(EXIT_CODES[code]).toBeTypeOf('number');
    }
  });

  test('exit codes are within valid 1-255 range', () => {
    for (const exit of Object.values(EXIT_CODES)) {
      expect(exit).toBeGreaterThanOrEqual(1);
      expect(exit).toBeLessThanOrEqual(255);
    }
  });

  test('maps each domain to its exit code band', () => {
    expect(getExitCode(ErrorCode.INVALID_TRACE_LENGTH)).toBe(10);
    expect(getExitCode(ErrorCode.TRACE_LIMIT_EXCEEDED)).toBe(11);
    expect(getExitCode(ErrorCode.INVALID_MACHINE_DEFINITION)).toBe(20);
    expect(getExitCode(ErrorCode.MACHINE_PARSE_FAILED)).toBe(21);
    expect(getExitCode(ErrorCode.NO_COMPLETION_FOUND)).toBe(30);
    expect(getExitCode(ErrorCode.CONFIGURATION_ERROR)).toBe(50);
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
  });

  test('Severity type is exported and constrained', () => {
    const sev: Severity = 'error';
    expect(sev).toBe('error');
  });
});
