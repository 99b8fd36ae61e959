/** Ordered tuple of component names an operation acts on. */
export type Locus = readonly string[];

// ── Architecture input ─────────────────────────────────────

export interface GateImplementationDef {
  readonly loci: readonly Locus[];
}

export interface DefaultImplementationOverrideDef {
  readonly locus: Locus;
  readonly implementation: string;
}

export interface GateInfoDef {
  readonly implementations: Readonly<Record<string, GateImplementationDef>>;
  readonly defaultImplementation: string;
  readonly overrideDefaultImplementation?: readonly DefaultImplementationOverrideDef[];
}

/**
 * Calibration-dependent architecture description as handed over by whatever fetched it.
 * Turned into an {@link ArchitectureSnapshot} before any circuit is checked against it.
 */
export interface DynamicArchitectureDef {
  readonly calibrationSetId: string;
  readonly qubits: readonly string[];
  readonly computationalResonators: readonly string[];
  readonly gates: Readonly<Record<string, GateInfoDef>>;
}

// ── Architecture snapshot ──────────────────────────────────

export interface GateImplementationSnapshot {
  readonly name: string;
  readonly loci: readonly Locus[];
}

export interface GateSnapshot {
  readonly name: string;
  readonly implementations: ReadonlyMap<string, GateImplementationSnapshot>;
  readonly defaultImplementation: string;
  /** Loci of every implementation, deduplicated in first-declared order. */
  readonly loci: readonly Locus[];
  /** Keyed by {@link locusKey}. */
  readonly overrides: ReadonlyMap<string, string>;
}

export interface ArchitectureSnapshot {
  readonly calibrationSetId: string;
  readonly qubits: ReadonlySet<string>;
  readonly computationalResonators: ReadonlySet<string>;
  readonly components: ReadonlySet<string>;
  readonly componentList: readonly string[];
  readonly gates: ReadonlyMap<string, GateSnapshot>;
}

// ── Operations ─────────────────────────────────────────────

export type OperationRole =
  | 'barrier'
  | 'delay'
  | 'measurement'
  | 'single-qubit-rotation'
  | 'conditional-rotation'
  | 'reset'
  | 'two-qubit-gate'
  | 'move';

export type ArgumentKind = 'number' | 'string';

export interface OperationDescriptor {
  readonly name: string;
  /** Number of locus components; 0 means any non-zero number. */
  readonly arity: number;
  readonly args: Readonly<Record<string, ArgumentKind>>;
  readonly optionalArgs: Readonly<Record<string, ArgumentKind>>;
  readonly symmetric: boolean;
  readonly factorizable: boolean;
  readonly noCalibrationNeeded: boolean;
  readonly role: OperationRole;
  readonly renamedTo?: string;
}

export type OperationTable = Readonly<Record<string, OperationDescriptor>>;

// ── Circuits ───────────────────────────────────────────────

export interface Instruction {
  readonly name: string;
  readonly qubits: Locus;
  readonly args: Readonly<Record<string, unknown>>;
  readonly implementation?: string | null;
}

export interface Circuit {
  readonly name: string;
  readonly instructions: readonly Instruction[];
  readonly metadata?: Readonly<Record<string, unknown>>;
}

export type CircuitBatch = readonly Circuit[];

/** Logical qubit name (as used in instructions) to physical component name. */
export type QubitMapping = ReadonlyMap<string, string>;

export interface InstructionSite {
  readonly circuitIndex: number | null;
  readonly instructionIndex: number | null;
}

export interface MappedLocus {
  readonly original: Locus;
  readonly mapped: Locus;
  /** Components of the original locus that a supplied mapping does not cover. */
  readonly unmapped: readonly string[];
}

export interface ResolvedInstruction {
  readonly operation: string;
  readonly implementation: string | null;
  readonly locus: Locus;
}

// ── Validation modes ───────────────────────────────────────

export type MoveValidationMode = 'none' | 'strict' | 'allow-prx';

// ── Collector ──────────────────────────────────────────────

export type ValidationWarningCode =
  | 'DEPRECATED_OPERATION_NAME'
  | 'MOVE_VALIDATION_DISABLED'
  | 'OPEN_SANDWICH_TOLERATED';

export interface ValidationWarning {
  readonly code: ValidationWarningCode;
  readonly message: string;
  readonly context: Readonly<Record<string, unknown>>;
}

export type ValidationTraceEntry =
  | {
      readonly kind: 'qubitMappingValidated';
      readonly size: number;
    }
  | {
      readonly kind: 'instructionResolved';
      readonly circuitIndex: number;
      readonly instructionIndex: number;
      readonly operation: string;
      readonly implementation: string | null;
      readonly locus: Locus;
    }
  | {
      readonly kind: 'moveSandwichOpened' | 'moveSandwichClosed';
      readonly circuitIndex: number | null;
      readonly instructionIndex: number;
      readonly qubit: string;
      readonly resonator: string;
    }
  | {
      readonly kind: 'circuitValidated';
      readonly circuitIndex: number;
      readonly instructionCount: number;
    };

export interface ValidationCollector {
  readonly warnings: ValidationWarning[];
  readonly trace: ValidationTraceEntry[] | null;
}

export interface CircuitValidationReport {
  readonly circuitIndex: number;
  readonly name: string;
  readonly instructions: readonly ResolvedInstruction[];
}

export interface CircuitBatchValidationReport {
  readonly calibrationSetId: string;
  readonly circuitCount: number;
  readonly instructionCount: number;
  readonly circuits: readonly CircuitValidationReport[];
  readonly warnings: readonly ValidationWarning[];
  readonly trace: readonly ValidationTraceEntry[] | null;
}
