// @tracefit/core entry point
//
// Public API:
// - completeTrace() (./api.js) is the high-level facade: raw trace text → decode → search.
// - The building blocks stay exported for callers that already hold steps or a model:
//   decodeTrace(), TransducerModel/loadMachine(), solve()/completeSteps(), replay helpers.

export * from './api.js';

// Transducer vocabulary
export {
  INPUT_PAIRS,
  isBit,
  isInputPair,
  type Bit,
  type InputPair,
  type MachineDefinition,
  type StateId,
  type Step,
  type Transition,
  type TransitionTarget,
} from './types/transducer.js';

// Transducer model
export {
  DEFAULT_MACHINE,
  TransducerModel,
  defaultModel,
} from './model/transducer.js';
export {
  MACHINE_SCHEMA,
  STATE_NAME_PATTERN,
  loadMachine,
  parseMachine,
} from './model/machine-loader.js';
export {
  isSynthesizedStateId,
  synthesizedStateId,
  synthesizedTag,
} from './model/states.js';

// Trace decoding
export {
  STEP_WIDTH,
  cleanTrace,
  decodeTrace,
  encodeTrace,
} from './trace/decoder.js';

// Search
export {
  SearchSession,
  completeSteps,
  solve,
  type SolveContext,
} from './search/engine.js';
export { ExtensionSet } from './search/extension-set.js';
export {
  replayCompletion,
  verifyCompletion,
  type ReplayResult,
} from './search/replay.js';
export type {
  Completion,
  ExtensionTransition,
  PathTransition,
  TransitionKind,
} from './search/types.js';

// Options
export {
  DEFAULT_MAX_STEPS,
  resolveSearchOptions,
  type ResolvedSearchOptions,
  type SearchOptions,
} from './types/options.js';

// Result
export { Err, Ok, err, isErr, isOk, ok, type Result } from './types/result.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  getExitCode,
  type Severity,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  ConfigError,
  InternalError,
  MachineDefinitionError,
  SearchError,
  TraceError,
  TracefitError,
  isTracefitError,
  type ErrorContext,
  type SerializedError,
  type TracefitErrorParams,
} from './types/errors.js';

// Metrics
export {
  METRIC_PHASES,
  MetricsCollector,
  type MetricPhase,
  type MetricsCollectorOptions,
  type MetricsSnapshot,
} from './util/metrics.js';
