import type { Diagnostic } from './diagnostics.js';
import { hasErrorDiagnostics } from './diagnostics.js';
import { isMoveOperation, SUPPORTED_OPERATIONS } from './operations.js';
import { pushUnknownNameDiagnostic } from './suggestions.js';
import type {
  ArchitectureSnapshot,
  DynamicArchitectureDef,
  GateImplementationSnapshot,
  GateInfoDef,
  GateSnapshot,
  Locus,
  OperationTable,
} from './types.js';
import { ArchitectureDefinitionError } from './validation-error.js';

const COMPONENT_NAME_PATTERN = /^(.*?)(\d+)$/;

export const locusKey = (locus: Locus): string => JSON.stringify(locus);

/** Orders names by prefix, then by numeric suffix, so `QB2` sorts before `QB10`. */
export const compareComponentNames = (left: string, right: string): number => {
  const leftMatch = COMPONENT_NAME_PATTERN.exec(left);
  const rightMatch = COMPONENT_NAME_PATTERN.exec(right);
  if (leftMatch !== null && rightMatch !== null) {
    const prefixOrder = (leftMatch[1] ?? '').localeCompare(rightMatch[1] ?? '');
    if (prefixOrder !== 0) {
      return prefixOrder;
    }
    const numberOrder = Number(leftMatch[2]) - Number(rightMatch[2]);
    if (numberOrder !== 0) {
      return numberOrder;
    }
  }
  return left.localeCompare(right);
};

const checkDuplicateComponents = (diagnostics: Diagnostic[], values: readonly string[], pathPrefix: string): void => {
  const seen = new Set<string>();

  for (const [index, value] of values.entries()) {
    if (!seen.has(value)) {
      seen.add(value);
      continue;
    }

    diagnostics.push({
      code: 'ARCH_COMPONENT_DUPLICATE',
      path: `${pathPrefix}[${index}]`,
      severity: 'error',
      message: `Duplicate component "${value}".`,
    });
  }
};

const validateGateDef = (
  diagnostics: Diagnostic[],
  gateName: string,
  gate: GateInfoDef,
  components: ReadonlySet<string>,
  componentCandidates: readonly string[],
): void => {
  const path = `gates.${gateName}`;
  const implementationNames = Object.keys(gate.implementations);

  if (implementationNames.length === 0) {
    diagnostics.push({
      code: 'ARCH_GATE_NO_IMPLEMENTATIONS',
      path: `${path}.implementations`,
      severity: 'error',
      message: `Gate "${gateName}" declares no implementations.`,
    });
    return;
  }

  if (!implementationNames.includes(gate.defaultImplementation)) {
    pushUnknownNameDiagnostic(diagnostics, {
      code: 'ARCH_DEFAULT_IMPLEMENTATION_MISSING',
      path: `${path}.defaultImplementation`,
      message: `Default implementation "${gate.defaultImplementation}" is not declared for gate "${gateName}".`,
      name: gate.defaultImplementation,
      declared: implementationNames,
    });
  }

  for (const implementationName of implementationNames) {
    const implementation = gate.implementations[implementationName];
    if (implementation === undefined) {
      continue;
    }
    implementation.loci.forEach((locus, locusIndex) => {
      const locusPath = `${path}.implementations.${implementationName}.loci[${locusIndex}]`;
      if (locus.length === 0) {
        diagnostics.push({
          code: 'ARCH_LOCUS_EMPTY',
          path: locusPath,
          severity: 'error',
          message: `Empty locus declared for "${gateName}.${implementationName}".`,
        });
        return;
      }
      locus.forEach((component, componentIndex) => {
        if (components.has(component)) {
          return;
        }
        pushUnknownNameDiagnostic(diagnostics, {
          code: 'ARCH_LOCUS_COMPONENT_UNKNOWN',
          path: `${locusPath}[${componentIndex}]`,
          message: `Unknown component "${component}" in locus of "${gateName}.${implementationName}".`,
          name: component,
          declared: componentCandidates,
        });
      });
    });
  }

  (gate.overrideDefaultImplementation ?? []).forEach((override, overrideIndex) => {
    const overridePath = `${path}.overrideDefaultImplementation[${overrideIndex}]`;
    const implementation = gate.implementations[override.implementation];
    if (implementation === undefined || !implementationNames.includes(override.implementation)) {
      pushUnknownNameDiagnostic(diagnostics, {
        code: 'ARCH_OVERRIDE_IMPLEMENTATION_MISSING',
        path: `${overridePath}.implementation`,
        message: `Override implementation "${override.implementation}" is not declared for gate "${gateName}".`,
        name: override.implementation,
        declared: implementationNames,
      });
      return;
    }
    const key = locusKey(override.locus);
    if (!implementation.loci.some((locus) => locusKey(locus) === key)) {
      diagnostics.push({
        code: 'ARCH_OVERRIDE_LOCUS_UNDECLARED',
        path: `${overridePath}.locus`,
        severity: 'error',
        message: `Locus ${key} is not declared by "${gateName}.${override.implementation}".`,
      });
    }
  });
};

export const validateArchitectureDef = (def: DynamicArchitectureDef): Diagnostic[] => {
  const diagnostics: Diagnostic[] = [];

  if (def.calibrationSetId.trim().length === 0) {
    diagnostics.push({
      code: 'ARCH_CALIBRATION_SET_ID_EMPTY',
      path: 'calibrationSetId',
      severity: 'error',
      message: 'Calibration set id must not be empty.',
    });
  }

  checkDuplicateComponents(diagnostics, def.qubits, 'qubits');
  checkDuplicateComponents(diagnostics, def.computationalResonators, 'computationalResonators');

  const qubits = new Set(def.qubits);
  def.computationalResonators.forEach((resonator, index) => {
    if (qubits.has(resonator)) {
      diagnostics.push({
        code: 'ARCH_COMPONENT_OVERLAP',
        path: `computationalResonators[${index}]`,
        severity: 'error',
        message: `Component "${resonator}" is declared both as a qubit and as a computational resonator.`,
      });
    }
  });

  const components = new Set([...def.qubits, ...def.computationalResonators]);
  const componentCandidates = [...components].sort(compareComponentNames);
  for (const [gateName, gate] of Object.entries(def.gates)) {
    validateGateDef(diagnostics, gateName, gate, components, componentCandidates);
  }

  return diagnostics;
};

const uniqueLoci = (lociLists: readonly (readonly Locus[])[]): readonly Locus[] => {
  const seen = new Set<string>();
  const loci: Locus[] = [];
  for (const list of lociLists) {
    for (const locus of list) {
      const key = locusKey(locus);
      if (seen.has(key)) {
        continue;
      }
      seen.add(key);
      loci.push(Object.freeze([...locus]));
    }
  }
  return Object.freeze(loci);
};

const createGateSnapshot = (name: string, gate: GateInfoDef): GateSnapshot => {
  const implementations = new Map<string, GateImplementationSnapshot>();
  for (const [implementationName, implementation] of Object.entries(gate.implementations)) {
    implementations.set(
      implementationName,
      Object.freeze({ name: implementationName, loci: uniqueLoci([implementation.loci]) }),
    );
  }

  const overrides = new Map<string, string>();
  for (const override of gate.overrideDefaultImplementation ?? []) {
    overrides.set(locusKey(override.locus), override.implementation);
  }

  return Object.freeze({
    name,
    implementations,
    defaultImplementation: gate.defaultImplementation,
    loci: uniqueLoci([...implementations.values()].map((implementation) => implementation.loci)),
    overrides,
  });
};

/**
 * Builds the read-only view validation runs against.
 *
 * @throws ArchitectureDefinitionError when {@link validateArchitectureDef} reports any error.
 */
export const createArchitectureSnapshot = (def: DynamicArchitectureDef): ArchitectureSnapshot => {
  const diagnostics = validateArchitectureDef(def);
  if (hasErrorDiagnostics(diagnostics)) {
    throw new ArchitectureDefinitionError(diagnostics.filter((diagnostic) => diagnostic.severity === 'error'));
  }

  const gates = new Map<string, GateSnapshot>();
  for (const [gateName, gate] of Object.entries(def.gates)) {
    gates.set(gateName, createGateSnapshot(gateName, gate));
  }

  const componentList = Object.freeze(
    [...def.qubits, ...def.computationalResonators].sort(compareComponentNames),
  );

  return Object.freeze({
    calibrationSetId: def.calibrationSetId,
    qubits: new Set(def.qubits),
    computationalResonators: new Set(def.computationalResonators),
    components: new Set(componentList),
    componentList,
    gates,
  });
};

export const defaultImplementationForLocus = (gate: GateSnapshot, locus: Locus): string =>
  gate.overrides.get(locusKey(locus)) ?? gate.defaultImplementation;

export const hasMoveSupport = (
  architecture: ArchitectureSnapshot,
  operations: OperationTable = SUPPORTED_OPERATIONS,
): boolean => [...architecture.gates.keys()].some((gateName) => isMoveOperation(gateName, operations));
