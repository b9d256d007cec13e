/**
 * Error hierarchy for tracefit
 * Provides structured error handling with context and suggestions
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  trace?: string; // cleaned trace symbols
  stepIndex?: number; // step position inside the trace
  state?: string; // transducer state involved
  setting?: string; // option name for configuration failures
  valueExcerpt?: string; // safe excerpt of the offending value
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  suggestions?: string[];
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface TracefitErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  suggestions?: string[];
  cause?: Error;
}

type SubclassParams = Omit<TracefitErrorParams, 'errorCode'> & {
  errorCode?: ErrorCode;
};

/**
 * Base error class for all tracefit errors
 */
export abstract class TracefitError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public suggestions?: string[];

  constructor(params: TracefitErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, cause ? { cause } : undefined);
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.suggestions = params.suggestions;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: excludes stack
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const cause = this.cause instanceof Error ? this.cause : undefined;
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      suggestions: this.suggestions,
      cause: cause ? { name: cause.name, message: cause.message } : undefined,
    };
    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

/**
 * Raw trace problems (length, size guards)
 */
export class TraceError extends TracefitError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.INVALID_TRACE_LENGTH });
  }

  get trace(): string | undefined {
    return this.context?.trace;
  }
}

/**
 * Invalid or unparsable machine definitions
 */
export class MachineDefinitionError extends TracefitError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_MACHINE_DEFINITION,
    });
  }
}

/**
 * Search outcomes that cannot produce a completion
 */
export class SearchError extends TracefitError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.NO_COMPLETION_FOUND });
  }
}

/**
 * Configuration and option errors
 */
export class ConfigError extends TracefitError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Unexpected failures inside the engine
 */
export class InternalError extends TracefitError {
  constructor(params: SubclassParams) {
    super({ ...params, errorCode: params.errorCode ?? ErrorCode.INTERNAL_ERROR });
  }
}

export function isTracefitError(error: unknown): error is TracefitError {
  return error instanceof TracefitError;
}
