import Ajv, { type ErrorObject } from 'ajv';

import { ErrorCode } from '../errors/codes.js';
import { MachineDefinitionError } from '../types/errors.js';
import type { MachineDefinition } from '../types/transducer.js';
import { isSynthesizedStateId } from './states.js';
import { TransducerModel } from './transducer.js';

/**
 * State names are identifiers. A leading letter or underscore also keeps
 * object key order equal to declaration order (integer-like keys sort first).
 */
export const STATE_NAME_PATTERN = '^[A-Za-z_][A-Za-z0-9_]*$';

export const MACHINE_SCHEMA = {
  $id: 'https://tracefit.local/schemas/machine.json',
  type: 'object',
  required: ['states'],
  additionalProperties: false,
  properties: {
    states: {
      type: 'object',
      minProperties: 1,
      propertyNames: { type: 'string', pattern: STATE_NAME_PATTERN },
      additionalProperties: {
        type: 'object',
        propertyNames: { type: 'string', pattern: '^[01]{2}$' },
        additionalProperties: {
          type: 'object',
          required: ['to', 'output'],
          additionalProperties: false,
          properties: {
            to: { type: 'string', pattern: STATE_NAME_PATTERN },
            output: { type: 'string', enum: ['0', '1'] },
          },
        },
      },
    },
  },
} as const;

const ajv = new Ajv({ allErrors: true, strict: true });
const validateShape = ajv.compile<MachineDefinition>(MACHINE_SCHEMA);

function formatAjvError(error: ErrorObject): string {
  const where = error.instancePath || '/';
  return `${where} ${error.message ?? 'is invalid'}`;
}

/**
 * Cross-reference checks the schema cannot express.
 */
function semanticProblems(definition: MachineDefinition): string[] {
  const problems: string[] = [];
  const declared = new Set(Object.keys(definition.states));
  for (const [state, row] of Object.entries(definition.states)) {
    if (isSynthesizedStateId(state)) {
      problems.push(
        `/states/${state} uses a name reserved for synthesized states (N<number>)`
      );
    }
    for (const [input, target] of Object.entries(row)) {
      if (target && !declared.has(target.to)) {
        problems.push(
          `/states/${state}/${input}/to references undeclared state "${target.to}"`
        );
      }
    }
  }
  return problems;
}

/**
 * Validate an untrusted machine definition and build its model.
 */
export function loadMachine(definition: unknown): TransducerModel {
  if (!validateShape(definition)) {
    const messages = (validateShape.errors ?? []).map(formatAjvError);
    throw new MachineDefinitionError({
      message: 'Machine definition does not match the expected shape',
      suggestions: messages,
    });
  }
  const problems = semanticProblems(definition);
  if (problems.length > 0) {
    throw new MachineDefinitionError({
      message: 'Machine definition is inconsistent',
      suggestions: problems,
    });
  }
  return TransducerModel.fromDefinition(definition);
}

/**
 * Parse machine JSON text (e.g. the contents of a --machine file).
 */
export function parseMachine(text: string): TransducerModel {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new MachineDefinitionError({
      message: `Machine file is not valid JSON: ${
        error instanceof Error ? error.message : String(error)
      }`,
      errorCode: ErrorCode.MACHINE_PARSE_FAILED,
      cause: error instanceof Error ? error : undefined,
    });
  }
  return loadMachine(parsed);
}
