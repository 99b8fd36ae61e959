import type { OperationDescriptor, OperationRole, OperationTable } from './types.js';

export const OPERATION_ROLES = [
  'barrier',
  'delay',
  'measurement',
  'single-qubit-rotation',
  'conditional-rotation',
  'reset',
  'two-qubit-gate',
  'move',
] as const satisfies readonly OperationRole[];

const NO_ARGS: Readonly<Record<string, never>> = Object.freeze({});

const ROTATION_ARGS = Object.freeze({ angle_t: 'number', phase_t: 'number' } as const);

const defineOperation = (
  descriptor: Pick<OperationDescriptor, 'name' | 'arity' | 'role'> & Partial<OperationDescriptor>,
): OperationDescriptor =>
  Object.freeze({
    args: NO_ARGS,
    optionalArgs: NO_ARGS,
    symmetric: false,
    factorizable: false,
    noCalibrationNeeded: false,
    ...descriptor,
  });

/**
 * Architecture-independent operation semantics.
 *
 * `arity: 0` accepts any non-empty locus. Entries with `renamedTo` are deprecated aliases and
 * resolve to their canonical descriptor before any architecture lookup.
 */
export const SUPPORTED_OPERATIONS: OperationTable = Object.freeze({
  barrier: defineOperation({ name: 'barrier', arity: 0, role: 'barrier', symmetric: true, noCalibrationNeeded: true }),
  delay: defineOperation({
    name: 'delay',
    arity: 0,
    role: 'delay',
    args: { duration: 'number' },
    symmetric: true,
    noCalibrationNeeded: true,
  }),
  measure: defineOperation({
    name: 'measure',
    arity: 0,
    role: 'measurement',
    args: { key: 'string' },
    optionalArgs: { feedback_key: 'string' },
    factorizable: true,
  }),
  measurement: defineOperation({
    name: 'measurement',
    arity: 0,
    role: 'measurement',
    args: { key: 'string' },
    factorizable: true,
    renamedTo: 'measure',
  }),
  prx: defineOperation({ name: 'prx', arity: 1, role: 'single-qubit-rotation', args: ROTATION_ARGS }),
  phased_rx: defineOperation({
    name: 'phased_rx',
    arity: 1,
    role: 'single-qubit-rotation',
    args: ROTATION_ARGS,
    renamedTo: 'prx',
  }),
  cc_prx: defineOperation({
    name: 'cc_prx',
    arity: 1,
    role: 'conditional-rotation',
    args: { ...ROTATION_ARGS, feedback_qubit: 'string', feedback_key: 'string' },
  }),
  reset: defineOperation({ name: 'reset', arity: 0, role: 'reset', symmetric: true, factorizable: true }),
  reset_wait: defineOperation({
    name: 'reset_wait',
    arity: 0,
    role: 'reset',
    symmetric: true,
    factorizable: true,
    noCalibrationNeeded: true,
  }),
  cz: defineOperation({ name: 'cz', arity: 2, role: 'two-qubit-gate', symmetric: true }),
  move: defineOperation({ name: 'move', arity: 2, role: 'move' }),
});

export interface OperationResolution {
  readonly descriptor: OperationDescriptor;
  /** Set when the instruction used a deprecated alias. */
  readonly alias: string | null;
}

const lookupOwn = (table: OperationTable, name: string): OperationDescriptor | undefined =>
  Object.prototype.hasOwnProperty.call(table, name) ? table[name] : undefined;

export const resolveOperation = (
  name: string,
  table: OperationTable = SUPPORTED_OPERATIONS,
): OperationResolution | undefined => {
  const descriptor = lookupOwn(table, name);
  if (descriptor === undefined) {
    return undefined;
  }
  if (descriptor.renamedTo === undefined) {
    return { descriptor, alias: null };
  }

  const canonical = lookupOwn(table, descriptor.renamedTo);
  if (canonical === undefined) {
    return { descriptor, alias: null };
  }
  return { descriptor: canonical, alias: name };
};

export const isMoveOperation = (name: string, table: OperationTable): boolean =>
  resolveOperation(name, table)?.descriptor.role === 'move';
