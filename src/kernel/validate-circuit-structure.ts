import { resolveOperation, SUPPORTED_OPERATIONS } from './operations.js';
import type { ArgumentKind, Circuit, Instruction, InstructionSite, OperationDescriptor, OperationTable } from './types.js';
import { circuitValidationError } from './validation-error.js';
import type { InstructionViolation } from './validation-reasons.js';

const matchesKind = (value: unknown, kind: ArgumentKind): boolean => typeof value === kind;

const invalidInstruction = (
  instruction: Instruction,
  site: InstructionSite,
  violation: InstructionViolation,
  detail: string,
  argument?: string,
) =>
  circuitValidationError(
    'invalid-instruction',
    site.circuitIndex,
    {
      instruction,
      instructionIndex: site.instructionIndex,
      violation,
      ...(argument === undefined ? {} : { argument }),
    },
    `${instruction.name}(${instruction.qubits.join(', ')}): ${detail}`,
  );

const validateArguments = (instruction: Instruction, descriptor: OperationDescriptor, site: InstructionSite): void => {
  for (const [argument, kind] of Object.entries(descriptor.args)) {
    if (!Object.prototype.hasOwnProperty.call(instruction.args, argument)) {
      throw invalidInstruction(instruction, site, 'missing-argument', `missing argument '${argument}'`, argument);
    }
    if (!matchesKind(instruction.args[argument], kind)) {
      throw invalidInstruction(instruction, site, 'argument-type', `argument '${argument}' must be a ${kind}`, argument);
    }
  }

  for (const [argument, value] of Object.entries(instruction.args)) {
    if (Object.prototype.hasOwnProperty.call(descriptor.args, argument)) {
      continue;
    }
    const optionalKind = Object.prototype.hasOwnProperty.call(descriptor.optionalArgs, argument)
      ? descriptor.optionalArgs[argument]
      : undefined;
    if (optionalKind === undefined) {
      throw invalidInstruction(instruction, site, 'unknown-argument', `unknown argument '${argument}'`, argument);
    }
    if (!matchesKind(value, optionalKind)) {
      throw invalidInstruction(
        instruction,
        site,
        'argument-type',
        `argument '${argument}' must be a ${optionalKind}`,
        argument,
      );
    }
  }
};

/** Architecture-independent shape checks for one instruction. */
export const validateInstructionStructure = (
  instruction: Instruction,
  site: InstructionSite,
  operations: OperationTable = SUPPORTED_OPERATIONS,
): void => {
  const resolution = resolveOperation(instruction.name, operations);
  if (resolution === undefined) {
    throw circuitValidationError(
      'unknown-operation',
      site.circuitIndex,
      { instruction, instructionIndex: site.instructionIndex, operation: instruction.name },
      `'${instruction.name}'`,
    );
  }
  const { descriptor } = resolution;

  if (instruction.qubits.length === 0) {
    throw invalidInstruction(instruction, site, 'empty-locus', 'locus must not be empty');
  }
  if (new Set(instruction.qubits).size !== instruction.qubits.length) {
    throw invalidInstruction(instruction, site, 'duplicate-locus-component', 'locus components must be unique');
  }
  if (descriptor.arity !== 0 && instruction.qubits.length !== descriptor.arity) {
    throw invalidInstruction(
      instruction,
      site,
      'arity',
      `'${descriptor.name}' acts on ${descriptor.arity} component(s), got ${instruction.qubits.length}`,
    );
  }

  validateArguments(instruction, descriptor, site);
};

/**
 * Checks a circuit against the static operation table only: a non-empty name, at least one
 * instruction, and well-formed instructions. Needs no architecture.
 */
export const validateCircuitStructure = (
  circuit: Circuit,
  circuitIndex: number | null = null,
  operations: OperationTable = SUPPORTED_OPERATIONS,
): void => {
  if (circuit.name.trim().length === 0) {
    throw circuitValidationError(
      'invalid-circuit',
      circuitIndex,
      { circuitName: circuit.name, field: 'name' },
      'circuit name must not be empty',
    );
  }
  if (circuit.instructions.length === 0) {
    throw circuitValidationError(
      'invalid-circuit',
      circuitIndex,
      { circuitName: circuit.name, field: 'instructions' },
      `circuit '${circuit.name}' has no instructions`,
    );
  }

  circuit.instructions.forEach((instruction, instructionIndex) => {
    validateInstructionStructure(instruction, { circuitIndex, instructionIndex }, operations);
  });
};
