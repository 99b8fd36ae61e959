import { createMeasurementKeyChecker } from './measurement-keys.js';
import { isMoveOperation } from './operations.js';
import { validateCircuitMoves } from './move-sandwich.js';
import { validateQubitMapping } from './qubit-mapping.js';
import type {
  ArchitectureSnapshot,
  Circuit,
  CircuitBatch,
  CircuitBatchValidationReport,
  CircuitValidationReport,
  ResolvedInstruction,
  ValidationCollector,
} from './types.js';
import { validateCircuitStructure } from './validate-circuit-structure.js';
import { validateInstruction } from './validate-instruction.js';
import { createCollector, emitTrace, emitWarning } from './validation-collector.js';
import { resolveValidationOptions, type CircuitValidationOptions, type ResolvedValidationOptions } from './validation-options.js';

const validateCircuitWithOptions = (
  architecture: ArchitectureSnapshot,
  circuit: Circuit,
  circuitIndex: number,
  options: ResolvedValidationOptions,
  collector: ValidationCollector,
): CircuitValidationReport => {
  const measurementKeys = createMeasurementKeyChecker(options.operations);
  const instructions: ResolvedInstruction[] = [];

  circuit.instructions.forEach((instruction, instructionIndex) => {
    const site = { circuitIndex, instructionIndex };
    const resolved = validateInstruction(architecture, instruction, {
      qubitMapping: options.qubitMapping,
      operations: options.operations,
      site,
      collector,
    });
    measurementKeys.check(instruction, site);
    instructions.push(resolved);
    emitTrace(collector, {
      kind: 'instructionResolved',
      circuitIndex,
      instructionIndex,
      operation: resolved.operation,
      implementation: resolved.implementation,
      locus: resolved.locus,
    });
  });

  validateCircuitMoves(architecture, circuit, {
    qubitMapping: options.qubitMapping,
    moveValidation: options.moveValidation,
    mustCloseSandwiches: options.mustCloseSandwiches,
    sandwichAllowedRoles: [...options.sandwichAllowedRoles],
    operations: options.operations,
    circuitIndex,
    collector,
  });

  emitTrace(collector, { kind: 'circuitValidated', circuitIndex, instructionCount: circuit.instructions.length });
  return { circuitIndex, name: circuit.name, instructions };
};

/**
 * Validates one circuit of a batch: structure (unless disabled), every instruction against the
 * architecture, measurement-key uniqueness, then MOVE sandwiches. Does not check the qubit
 * mapping itself; {@link validateCircuitBatch} does that once for the whole batch.
 */
export const validateCircuit = (
  architecture: ArchitectureSnapshot,
  circuit: Circuit,
  circuitIndex: number,
  options: CircuitValidationOptions = {},
  collector: ValidationCollector = createCollector(options),
): CircuitValidationReport => {
  const resolved = resolveValidationOptions(options);
  if (resolved.checkStructure) {
    validateCircuitStructure(circuit, circuitIndex, resolved.operations);
  }
  return validateCircuitWithOptions(architecture, circuit, circuitIndex, resolved, collector);
};

/**
 * Decides whether a circuit batch is admissible on the given architecture snapshot.
 *
 * Fails fast: the first violation anywhere in the batch is thrown as a
 * `CircuitValidationError` carrying the originating circuit index.
 */
export const validateCircuitBatch = (
  architecture: ArchitectureSnapshot,
  circuits: CircuitBatch,
  options: CircuitValidationOptions = {},
): CircuitBatchValidationReport => {
  const resolved = resolveValidationOptions(options);
  const collector = createCollector({ trace: resolved.trace });

  if (resolved.checkStructure) {
    circuits.forEach((circuit, circuitIndex) => {
      validateCircuitStructure(circuit, circuitIndex, resolved.operations);
    });
  }

  validateQubitMapping(architecture, circuits, resolved.qubitMapping);
  if (resolved.qubitMapping !== null) {
    emitTrace(collector, { kind: 'qubitMappingValidated', size: resolved.qubitMapping.size });
  }

  if (
    resolved.moveValidation === 'none'
    && circuits.some((circuit) => circuit.instructions.some((instruction) => isMoveOperation(instruction.name, resolved.operations)))
  ) {
    emitWarning(
      collector,
      'MOVE_VALIDATION_DISABLED',
      'MOVE validation is disabled; MOVE sandwiches in this batch are not checked.',
      { calibrationSetId: architecture.calibrationSetId },
    );
  }

  const reports = circuits.map((circuit, circuitIndex) =>
    validateCircuitWithOptions(architecture, circuit, circuitIndex, resolved, collector),
  );

  return {
    calibrationSetId: architecture.calibrationSetId,
    circuitCount: circuits.length,
    instructionCount: reports.reduce((total, report) => total + report.instructions.length, 0),
    circuits: reports,
    warnings: collector.warnings,
    trace: collector.trace,
  };
};
