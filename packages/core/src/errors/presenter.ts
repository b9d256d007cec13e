/**
 * ErrorPresenter - pure presentation layer for TracefitError instances
 * - No business logic; formats into environment-specific view objects
 */

import type { ErrorCode } from './codes.js';
import type {
  ErrorContext,
  SerializedError,
  TracefitError,
} from '../types/errors.js';

export interface PresenterOptions {
  colors?: boolean;
  terminalWidth?: number;
}

export interface CLIErrorView {
  title: string;
  code: ErrorCode;
  location?: string;
  excerpt?: string;
  suggestions: string[];
  colors: boolean;
  terminalWidth: number;
}

export class ErrorPresenter {
  constructor(
    private readonly _env: 'dev' | 'prod',
    private readonly options: PresenterOptions = {}
  ) {}

  formatForCLI(error: TracefitError): CLIErrorView {
    return {
      title: this.#formatTitle(error),
      code: error.errorCode,
      location: this.#formatLocation(error.context),
      excerpt: error.context?.valueExcerpt,
      suggestions: error.suggestions ?? [],
      colors: this.#shouldUseColors(this.options.colors),
      terminalWidth: this.#getTerminalWidth(this.options.terminalWidth),
    };
  }

  formatForJSON(error: TracefitError): SerializedError {
    return error.toJSON(this._env);
  }

  #formatTitle(error: TracefitError): string {
    return `Error ${error.errorCode}: ${error.message}`;
  }

  #formatLocation(ctx?: ErrorContext): string | undefined {
    if (!ctx) return undefined;
    if (ctx.stepIndex !== undefined && ctx.state !== undefined) {
      return `Location: step ${ctx.stepIndex} in state ${ctx.state}`;
    }
    if (ctx.stepIndex !== undefined) return `Location: step ${ctx.stepIndex}`;
    if (ctx.state !== undefined) return `Location: state ${ctx.state}`;
    if (ctx.setting !== undefined) return `Location: option ${ctx.setting}`;
    return undefined;
  }

  #shouldUseColors(opt?: boolean): boolean {
    const noColor = process.env.NO_COLOR;
    const force = process.env.FORCE_COLOR;
    if (noColor && noColor !== '0' && noColor !== 'false') return false;
    if (force && force !== '0' && force !== 'false') return true;
    // Default to enabling colors in dev when not specified
    if (typeof opt === 'undefined') return this._env === 'dev';
    return opt;
  }

  #getTerminalWidth(opt?: number): number {
    return opt || process.stdout?.columns || 80;
  }
}

export default ErrorPresenter;
