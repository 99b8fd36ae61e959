import { resolveOperation, SUPPORTED_OPERATIONS } from './operations.js';
import type { Instruction, InstructionSite, OperationTable } from './types.js';
import { circuitValidationError } from './validation-error.js';

export interface MeasurementKeyChecker {
  readonly keys: ReadonlySet<string>;
  check(instruction: Instruction, site: InstructionSite): void;
}

/** Circuit-scoped: create one per circuit, since keys may repeat across circuits of a batch. */
export const createMeasurementKeyChecker = (operations: OperationTable = SUPPORTED_OPERATIONS): MeasurementKeyChecker => {
  const keys = new Set<string>();

  return {
    keys,
    check(instruction, site) {
      if (resolveOperation(instruction.name, operations)?.descriptor.role !== 'measurement') {
        return;
      }

      const key = instruction.args['key'];
      if (typeof key !== 'string') {
        throw circuitValidationError(
          'invalid-instruction',
          site.circuitIndex,
          { instruction, instructionIndex: site.instructionIndex, violation: 'argument-type', argument: 'key' },
          `measurement key of ${instruction.name}(${instruction.qubits.join(', ')}) must be a string`,
        );
      }
      if (keys.has(key)) {
        throw circuitValidationError(
          'duplicate-measurement-key',
          site.circuitIndex,
          { instruction, instructionIndex: site.instructionIndex, key },
          `key '${key}' is already used by an earlier measurement`,
        );
      }
      keys.add(key);
    },
  };
};
