import { compareComponentNames } from './architecture.js';
import type { ArchitectureSnapshot, Circuit, CircuitBatch, Locus, MappedLocus, QubitMapping } from './types.js';
import { circuitValidationError } from './validation-error.js';

/**
 * Re-bases a locus from logical to physical names.
 *
 * Every check that looks at physical components goes through this function, so instruction
 * validation and MOVE tracking always see the same physical view of a circuit.
 */
export const mapLocus = (locus: Locus, mapping: QubitMapping | null | undefined): MappedLocus => {
  if (mapping === null || mapping === undefined) {
    return { original: locus, mapped: locus, unmapped: [] };
  }

  const mapped: string[] = [];
  const unmapped: string[] = [];
  for (const qubit of locus) {
    const physical = mapping.get(qubit);
    if (physical === undefined) {
      unmapped.push(qubit);
      mapped.push(qubit);
      continue;
    }
    mapped.push(physical);
  }
  return { original: locus, mapped, unmapped };
};

export const circuitQubits = (circuit: Circuit): ReadonlySet<string> => {
  const qubits = new Set<string>();
  for (const instruction of circuit.instructions) {
    for (const qubit of instruction.qubits) {
      qubits.add(qubit);
    }
  }
  return qubits;
};

/** Applies a mapping directly to the circuit's instructions. Unmapped names pass through. */
export const remapCircuit = (circuit: Circuit, mapping: QubitMapping): Circuit => ({
  ...circuit,
  instructions: circuit.instructions.map((instruction) => ({
    ...instruction,
    qubits: mapLocus(instruction.qubits, mapping).mapped,
  })),
});

/**
 * Checks a logical-to-physical mapping shared by every circuit of a batch: injective, covering
 * every qubit the batch uses, and targeting only components of the architecture.
 * A missing mapping means instructions already use physical names.
 */
export const validateQubitMapping = (
  architecture: ArchitectureSnapshot,
  circuits: CircuitBatch,
  mapping: QubitMapping | null | undefined,
): void => {
  if (mapping === null || mapping === undefined) {
    return;
  }

  const logicalByPhysical = new Map<string, string[]>();
  for (const [logical, physical] of mapping) {
    const logicalQubits = logicalByPhysical.get(physical);
    if (logicalQubits === undefined) {
      logicalByPhysical.set(physical, [logical]);
      continue;
    }
    logicalQubits.push(logical);
    throw circuitValidationError(
      'non-injective-mapping',
      null,
      { physical, logicalQubits: [...logicalQubits] },
      `${logicalQubits.join(', ')} all map to ${physical}`,
    );
  }

  circuits.forEach((circuit, circuitIndex) => {
    const missing = [...circuitQubits(circuit)].filter((qubit) => !mapping.has(qubit)).sort(compareComponentNames);
    if (missing.length > 0) {
      throw circuitValidationError(
        'unmapped-qubits',
        circuitIndex,
        { circuitName: circuit.name, qubits: missing },
        `qubits ${missing.join(', ')} in circuit '${circuit.name}' are not found in the qubit mapping`,
      );
    }
  });

  for (const [logical, physical] of mapping) {
    if (!architecture.components.has(physical)) {
      throw circuitValidationError(
        'unmapped-target-missing',
        null,
        { logical, physical },
        `component ${physical} (mapped from ${logical}) not present in architecture ${architecture.calibrationSetId}`,
      );
    }
  }
};
