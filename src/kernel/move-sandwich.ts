import { compareComponentNames, hasMoveSupport } from './architecture.js';
import { isMoveOperation, resolveOperation } from './operations.js';
import { mapLocus } from './qubit-mapping.js';
import type { ArchitectureSnapshot, Circuit, Instruction, MappedLocus, ValidationCollector } from './types.js';
import { emitTrace, emitWarning } from './validation-collector.js';
import { circuitValidationError } from './validation-error.js';
import { resolveValidationOptions, type CircuitValidationOptions } from './validation-options.js';

/**
 * Which qubit state each computational resonator currently holds, in physical names.
 * A resonator has an entry only while a MOVE sandwich is open on it, and a qubit is in
 * `parked` exactly when some entry names it.
 */
export interface ResonatorOccupancy {
  readonly occupation: Map<string, string>;
  readonly parked: Set<string>;
}

export const createResonatorOccupancy = (): ResonatorOccupancy => ({
  occupation: new Map(),
  parked: new Set(),
});

export const occupationRecord = (occupancy: ResonatorOccupancy): Readonly<Record<string, string>> =>
  Object.fromEntries([...occupancy.occupation].sort(([left], [right]) => compareComponentNames(left, right)));

const describeOccupation = (occupancy: ResonatorOccupancy): string => {
  const entries = Object.entries(occupationRecord(occupancy)).map(([resonator, qubit]) => `${resonator}: ${qubit}`);
  return `{${entries.join(', ')}}`;
};

export interface MoveSandwichOptions extends CircuitValidationOptions {
  readonly circuitIndex?: number | null;
  readonly collector?: ValidationCollector;
}

/**
 * Walks one circuit's instructions in order and enforces MOVE sandwich pairing: a MOVE into a
 * free resonator parks the qubit state there, the next MOVE on that resonator must bring the same
 * qubit back, and no instruction outside the allow-list may touch a parked qubit meanwhile.
 */
export const validateCircuitMoves = (
  architecture: ArchitectureSnapshot,
  circuit: Circuit,
  options: MoveSandwichOptions = {},
): void => {
  const resolved = resolveValidationOptions(options);
  if (resolved.moveValidation === 'none') {
    return;
  }

  const circuitIndex = options.circuitIndex ?? null;
  const { operations, qubitMapping } = resolved;

  if (!hasMoveSupport(architecture, operations)) {
    const instructionIndex = circuit.instructions.findIndex((instruction) => isMoveOperation(instruction.name, operations));
    const instruction = circuit.instructions[instructionIndex];
    if (instruction !== undefined) {
      throw circuitValidationError(
        'move-unsupported',
        circuitIndex,
        { instruction, instructionIndex },
        `architecture ${architecture.calibrationSetId} has no MOVE gate`,
      );
    }
    return;
  }

  const occupancy = createResonatorOccupancy();
  const failureBase = (instruction: Instruction, instructionIndex: number, locus: MappedLocus) => ({
    instruction,
    instructionIndex,
    locus: locus.original,
    ...(qubitMapping === null ? {} : { mappedLocus: locus.mapped }),
  });

  circuit.instructions.forEach((instruction, instructionIndex) => {
    const locus = mapLocus(instruction.qubits, qubitMapping);

    if (isMoveOperation(instruction.name, operations)) {
      const [qubit, resonator] = locus.mapped;
      if (
        locus.mapped.length !== 2
        || qubit === undefined
        || resonator === undefined
        || !architecture.qubits.has(qubit)
        || !architecture.computationalResonators.has(resonator)
      ) {
        throw circuitValidationError(
          'move-invalid-locus',
          circuitIndex,
          failureBase(instruction, instructionIndex, locus),
          `not (${locus.mapped.join(', ')})`,
        );
      }

      const occupyingQubit = occupancy.occupation.get(resonator);
      if (occupyingQubit === undefined) {
        if (occupancy.parked.has(qubit)) {
          const occupiedResonator =
            [...occupancy.occupation].find(([, parkedQubit]) => parkedQubit === qubit)?.[0] ?? '';
          throw circuitValidationError(
            'move-split-state',
            circuitIndex,
            { ...failureBase(instruction, instructionIndex, locus), qubit, resonator, occupiedResonator },
            `MOVE (${qubit}, ${resonator}): state of ${qubit} is in resonator ${occupiedResonator}`,
          );
        }
        occupancy.occupation.set(resonator, qubit);
        occupancy.parked.add(qubit);
        emitTrace(options.collector, {
          kind: 'moveSandwichOpened',
          circuitIndex,
          instructionIndex,
          qubit,
          resonator,
        });
        return;
      }

      if (occupyingQubit !== qubit) {
        throw circuitValidationError(
          'move-mismatched-close',
          circuitIndex,
          { ...failureBase(instruction, instructionIndex, locus), qubit, resonator, occupyingQubit },
          `MOVE (${qubit}, ${resonator}) while ${resonator} holds the state of ${occupyingQubit}`,
        );
      }
      occupancy.occupation.delete(resonator);
      occupancy.parked.delete(qubit);
      emitTrace(options.collector, {
        kind: 'moveSandwichClosed',
        circuitIndex,
        instructionIndex,
        qubit,
        resonator,
      });
      return;
    }

    if (occupancy.parked.size === 0) {
      return;
    }
    const role = resolveOperation(instruction.name, operations)?.descriptor.role;
    if (role !== undefined && resolved.sandwichAllowedRoles.has(role)) {
      return;
    }
    const parkedQubits = locus.mapped.filter((component) => occupancy.parked.has(component));
    if (parkedQubits.length > 0) {
      throw circuitValidationError(
        'move-qubit-in-use',
        circuitIndex,
        {
          ...failureBase(instruction, instructionIndex, locus),
          parkedQubits,
          occupation: occupationRecord(occupancy),
        },
        `${instruction.name} acts on ${parkedQubits.join(', ')}; resonator occupation ${describeOccupation(occupancy)}`,
      );
    }
  });

  if (occupancy.occupation.size === 0) {
    return;
  }
  if (resolved.mustCloseSandwiches) {
    throw circuitValidationError(
      'move-unclosed-sandwich',
      circuitIndex,
      { occupation: occupationRecord(occupancy) },
      `resonator occupation ${describeOccupation(occupancy)}`,
    );
  }
  emitWarning(
    options.collector,
    'OPEN_SANDWICH_TOLERATED',
    `Circuit '${circuit.name}' ends while qubit state(s) are still in a resonator.`,
    { circuitIndex, occupation: occupationRecord(occupancy) },
  );
};
