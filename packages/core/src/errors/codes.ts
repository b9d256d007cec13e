/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Trace Errors (E001–E099)
  INVALID_TRACE_LENGTH = 'E001',
  TRACE_LIMIT_EXCEEDED = 'E002',

  // Machine Errors (E100–E199)
  INVALID_MACHINE_DEFINITION = 'E100',
  MACHINE_PARSE_FAILED = 'E101',

  // Search Errors (E200–E299)
  NO_COMPLETION_FOUND = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_TRACE_LENGTH]: 10,
  [ErrorCode.TRACE_LIMIT_EXCEEDED]: 11,
  [ErrorCode.INVALID_MACHINE_DEFINITION]: 20,
  [ErrorCode.MACHINE_PARSE_FAILED]: 21,
  [ErrorCode.NO_COMPLETION_FOUND]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
