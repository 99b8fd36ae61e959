import { SUPPORTED_OPERATIONS } from './operations.js';
import type { MoveValidationMode, OperationRole, OperationTable, QubitMapping } from './types.js';

export const MOVE_VALIDATION_MODES = ['none', 'strict', 'allow-prx'] as const satisfies readonly MoveValidationMode[];

/** Operation roles that may act on a parked qubit, per MOVE validation mode. */
export const MOVE_SANDWICH_ALLOWED_ROLES: Readonly<Record<MoveValidationMode, readonly OperationRole[]>> = {
  none: [],
  strict: ['barrier'],
  'allow-prx': ['barrier', 'single-qubit-rotation'],
};

export interface CircuitValidationOptions {
  readonly qubitMapping?: QubitMapping | null;
  readonly moveValidation?: MoveValidationMode;
  /** Set to false when validating a request under construction rather than a final circuit. */
  readonly mustCloseSandwiches?: boolean;
  /** Replaces the allow-list derived from `moveValidation`. */
  readonly sandwichAllowedRoles?: readonly OperationRole[];
  readonly operations?: OperationTable;
  readonly checkStructure?: boolean;
  readonly trace?: boolean;
}

export interface ResolvedValidationOptions {
  readonly qubitMapping: QubitMapping | null;
  readonly moveValidation: MoveValidationMode;
  readonly mustCloseSandwiches: boolean;
  readonly sandwichAllowedRoles: ReadonlySet<OperationRole>;
  readonly operations: OperationTable;
  readonly checkStructure: boolean;
  readonly trace: boolean;
}

export const DEFAULT_VALIDATION_OPTIONS = Object.freeze({
  qubitMapping: null,
  moveValidation: 'strict',
  mustCloseSandwiches: true,
  operations: SUPPORTED_OPERATIONS,
  checkStructure: true,
  trace: false,
} as const satisfies Omit<ResolvedValidationOptions, 'sandwichAllowedRoles'>);

export const resolveValidationOptions = (options: CircuitValidationOptions = {}): ResolvedValidationOptions => {
  const moveValidation = options.moveValidation ?? DEFAULT_VALIDATION_OPTIONS.moveValidation;
  return Object.freeze({
    qubitMapping: options.qubitMapping ?? DEFAULT_VALIDATION_OPTIONS.qubitMapping,
    moveValidation,
    mustCloseSandwiches: options.mustCloseSandwiches ?? DEFAULT_VALIDATION_OPTIONS.mustCloseSandwiches,
    sandwichAllowedRoles: new Set(options.sandwichAllowedRoles ?? MOVE_SANDWICH_ALLOWED_ROLES[moveValidation]),
    operations: options.operations ?? DEFAULT_VALIDATION_OPTIONS.operations,
    checkStructure: options.checkStructure ?? DEFAULT_VALIDATION_OPTIONS.checkStructure,
    trace: options.trace ?? DEFAULT_VALIDATION_OPTIONS.trace,
  });
};
