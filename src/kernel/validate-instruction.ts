import { defaultImplementationForLocus, locusKey } from './architecture.js';
import { resolveOperation, SUPPORTED_OPERATIONS } from './operations.js';
import { mapLocus } from './qubit-mapping.js';
import type {
  ArchitectureSnapshot,
  Instruction,
  InstructionSite,
  Locus,
  MappedLocus,
  OperationTable,
  QubitMapping,
  ResolvedInstruction,
  ValidationCollector,
} from './types.js';
import { emitWarning } from './validation-collector.js';
import { circuitValidationError } from './validation-error.js';
import type { LocusRule } from './validation-reasons.js';

export interface InstructionValidationOptions {
  readonly qubitMapping?: QubitMapping | null;
  readonly operations?: OperationTable;
  readonly site?: InstructionSite;
  readonly collector?: ValidationCollector;
}

const NO_SITE: InstructionSite = { circuitIndex: null, instructionIndex: null };

export const describeInstruction = (instruction: Instruction): string => {
  const implementation = instruction.implementation ? `.${instruction.implementation}` : '';
  return `${instruction.name}${implementation}(${instruction.qubits.join(', ')})`;
};

const describeComponent = (logical: string, physical: string, mapped: boolean): string =>
  mapped ? `${logical} = ${physical}` : logical;

const describeLocus = (locus: MappedLocus, mapped: boolean): string =>
  mapped ? `(${locus.original.join(', ')}) = (${locus.mapped.join(', ')})` : `(${locus.original.join(', ')})`;

const permutationKey = (locus: Locus): string => locusKey([...locus].sort());

const findLocusViolation = (
  locus: Locus,
  allowedLoci: readonly Locus[],
  rule: Exclude<LocusRule, 'known-components'>,
): { readonly componentIndex: number | null } | null => {
  switch (rule) {
    case 'factorizable': {
      const allowedComponents = new Set(allowedLoci.flat());
      const componentIndex = locus.findIndex((component) => !allowedComponents.has(component));
      return componentIndex === -1 ? null : { componentIndex };
    }
    case 'symmetric': {
      const key = permutationKey(locus);
      return allowedLoci.some((allowed) => permutationKey(allowed) === key) ? null : { componentIndex: null };
    }
    case 'exact': {
      const key = locusKey(locus);
      return allowedLoci.some((allowed) => locusKey(allowed) === key) ? null : { componentIndex: null };
    }
  }
};

/**
 * Confirms a single instruction is executable on the architecture snapshot: the operation is
 * known, the gate and requested implementation exist, and the (mapped) locus is one the
 * implementation allows under the operation's symmetry and factorizability rules.
 *
 * Returns the canonical operation, the implementation that will run, and the physical locus.
 */
export const validateInstruction = (
  architecture: ArchitectureSnapshot,
  instruction: Instruction,
  options: InstructionValidationOptions = {},
): ResolvedInstruction => {
  const site = options.site ?? NO_SITE;
  const mapping = options.qubitMapping ?? null;
  const hasMapping = mapping !== null;

  const resolution = resolveOperation(instruction.name, options.operations ?? SUPPORTED_OPERATIONS);
  if (resolution === undefined) {
    throw circuitValidationError(
      'unknown-operation',
      site.circuitIndex,
      { instruction, instructionIndex: site.instructionIndex, operation: instruction.name },
      `'${instruction.name}'`,
    );
  }
  const { descriptor } = resolution;
  if (resolution.alias !== null) {
    emitWarning(
      options.collector,
      'DEPRECATED_OPERATION_NAME',
      `Operation '${resolution.alias}' is deprecated; use '${descriptor.name}'.`,
      { ...site, alias: resolution.alias, operation: descriptor.name },
    );
  }

  const locus = mapLocus(instruction.qubits, mapping);
  if (locus.unmapped.length > 0) {
    throw circuitValidationError(
      'unmapped-qubits',
      site.circuitIndex,
      { qubits: locus.unmapped, instructionIndex: site.instructionIndex },
      `${describeInstruction(instruction)}: qubits ${locus.unmapped.join(', ')} are not found in the qubit mapping`,
    );
  }

  const failureBase = {
    instruction,
    instructionIndex: site.instructionIndex,
    locus: locus.original,
    ...(hasMapping ? { mappedLocus: locus.mapped } : {}),
  };

  if (descriptor.noCalibrationNeeded) {
    const componentIndex = locus.mapped.findIndex((component) => !architecture.components.has(component));
    if (componentIndex !== -1) {
      const physical = locus.mapped[componentIndex] ?? '';
      throw circuitValidationError(
        'locus-not-allowed',
        site.circuitIndex,
        {
          ...failureBase,
          operation: descriptor.name,
          implementation: null,
          qualifiedName: descriptor.name,
          rule: 'known-components',
          component: physical,
        },
        `${describeInstruction(instruction)}: component ${describeComponent(
          locus.original[componentIndex] ?? physical,
          physical,
          hasMapping,
        )} does not exist in the architecture`,
      );
    }
    return { operation: descriptor.name, implementation: null, locus: locus.mapped };
  }

  const gate = architecture.gates.get(descriptor.name);
  if (gate === undefined) {
    throw circuitValidationError(
      'unsupported-operation',
      site.circuitIndex,
      { ...failureBase, operation: descriptor.name },
      `'${descriptor.name}' is not supported by architecture ${architecture.calibrationSetId}`,
    );
  }

  let allowedLoci: readonly Locus[] = gate.loci;
  const requestedImplementation = instruction.implementation ?? null;
  if (requestedImplementation !== null) {
    const implementation = gate.implementations.get(requestedImplementation);
    if (implementation === undefined) {
      throw circuitValidationError(
        'unsupported-implementation',
        site.circuitIndex,
        { ...failureBase, operation: descriptor.name, implementation: requestedImplementation },
        `'${descriptor.name}.${requestedImplementation}' is not supported by architecture ${architecture.calibrationSetId}`,
      );
    }
    allowedLoci = implementation.loci;
  }
  const qualifiedName =
    requestedImplementation === null ? descriptor.name : `${descriptor.name}.${requestedImplementation}`;

  const rule = descriptor.factorizable ? 'factorizable' : descriptor.symmetric ? 'symmetric' : 'exact';
  const violation = findLocusViolation(locus.mapped, allowedLoci, rule);
  if (violation !== null) {
    const component = violation.componentIndex === null ? undefined : locus.mapped[violation.componentIndex];
    const subject =
      component === undefined || violation.componentIndex === null
        ? describeLocus(locus, hasMapping)
        : `component ${describeComponent(locus.original[violation.componentIndex] ?? component, component, hasMapping)}`;
    throw circuitValidationError(
      'locus-not-allowed',
      site.circuitIndex,
      {
        ...failureBase,
        operation: descriptor.name,
        implementation: requestedImplementation,
        qualifiedName,
        rule,
        ...(component === undefined ? {} : { component }),
      },
      `${subject} is not allowed as locus for '${qualifiedName}'`,
    );
  }

  return {
    operation: descriptor.name,
    implementation: requestedImplementation ?? defaultImplementationForLocus(gate, locus.mapped),
    locus: locus.mapped,
  };
};
