import type { Diagnostic } from './diagnostics.js';
import { summarizeDiagnostics } from './diagnostics.js';
import { CIRCUIT_VALIDATION_REASON_MESSAGES } from './validation-reasons.js';
import type { CircuitValidationReason, InstructionViolation, LocusRule } from './validation-reasons.js';
import type { Instruction, Locus } from './types.js';

type InstructionFailureContext = Readonly<{
  readonly instruction: Instruction;
  readonly instructionIndex: number | null;
  readonly locus: Locus;
  /** Present only when a qubit mapping was applied. */
  readonly mappedLocus?: Locus;
}>;

export interface CircuitValidationContextByReason {
  readonly 'unknown-operation': Readonly<{
    readonly instruction: Instruction;
    readonly instructionIndex: number | null;
    readonly operation: string;
  }>;
  readonly 'unsupported-operation': InstructionFailureContext & Readonly<{ readonly operation: string }>;
  readonly 'unsupported-implementation': InstructionFailureContext & Readonly<{
    readonly operation: string;
    readonly implementation: string;
  }>;
  readonly 'locus-not-allowed': InstructionFailureContext & Readonly<{
    readonly operation: string;
    readonly implementation: string | null;
    readonly qualifiedName: string;
    readonly rule: LocusRule;
    readonly component?: string;
  }>;
  readonly 'non-injective-mapping': Readonly<{
    readonly physical: string;
    readonly logicalQubits: readonly string[];
  }>;
  readonly 'unmapped-qubits': Readonly<{
    readonly circuitName?: string;
    readonly qubits: readonly string[];
    readonly instructionIndex?: number | null;
  }>;
  readonly 'unmapped-target-missing': Readonly<{
    readonly logical: string;
    readonly physical: string;
  }>;
  readonly 'duplicate-measurement-key': Readonly<{
    readonly instruction: Instruction;
    readonly instructionIndex: number | null;
    readonly key: string;
  }>;
  readonly 'move-invalid-locus': InstructionFailureContext;
  readonly 'move-split-state': InstructionFailureContext & Readonly<{
    readonly qubit: string;
    readonly resonator: string;
    readonly occupiedResonator: string;
  }>;
  readonly 'move-mismatched-close': InstructionFailureContext & Readonly<{
    readonly qubit: string;
    readonly resonator: string;
    readonly occupyingQubit: string;
  }>;
  readonly 'move-qubit-in-use': InstructionFailureContext & Readonly<{
    readonly parkedQubits: readonly string[];
    readonly occupation: Readonly<Record<string, string>>;
  }>;
  readonly 'move-unsupported': Readonly<{
    readonly instruction: Instruction;
    readonly instructionIndex: number | null;
  }>;
  readonly 'move-unclosed-sandwich': Readonly<{
    readonly occupation: Readonly<Record<string, string>>;
  }>;
  readonly 'invalid-circuit': Readonly<{
    readonly circuitName: string;
    readonly field: 'name' | 'instructions';
  }>;
  readonly 'invalid-instruction': Readonly<{
    readonly instruction: Instruction;
    readonly instructionIndex: number | null;
    readonly violation: InstructionViolation;
    readonly argument?: string;
  }>;
}

export type CircuitValidationContext<R extends CircuitValidationReason = CircuitValidationReason> =
  CircuitValidationContextByReason[R];

const contextReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? `${value.toString()}n` : value;

/** Null when the context cannot be rendered as JSON, e.g. a cyclic argument value. */
function serializeContext(context: unknown): string | null {
  try {
    return JSON.stringify(context, contextReplacer);
  } catch (error) {
    if (error instanceof TypeError) {
      return null;
    }
    throw error;
  }
}

function formatMessage(
  reason: CircuitValidationReason,
  circuitIndex: number | null,
  detail: string | undefined,
  context: unknown,
): string {
  const scope = circuitIndex === null ? 'Circuit batch' : `Circuit ${circuitIndex}`;
  const base = `${scope}: ${CIRCUIT_VALIDATION_REASON_MESSAGES[reason]}`;
  const withDetail = detail === undefined ? base : `${base}: ${detail}`;
  const serialized = serializeContext(context);
  return serialized === null ? withDetail : `${withDetail} context=${serialized}`;
}

export class CircuitValidationError<R extends CircuitValidationReason = CircuitValidationReason> extends Error {
  readonly reason: R;
  readonly circuitIndex: number | null;
  readonly context: CircuitValidationContext<R>;
  readonly detail?: string;

  constructor(
    reason: R,
    circuitIndex: number | null,
    context: CircuitValidationContext<R>,
    detail?: string,
  ) {
    super(formatMessage(reason, circuitIndex, detail, context));
    this.name = 'CircuitValidationError';
    this.reason = reason;
    this.circuitIndex = circuitIndex;
    this.context = context;
    if (detail !== undefined) {
      this.detail = detail;
    }
  }
}

export const circuitValidationError = <R extends CircuitValidationReason>(
  reason: R,
  circuitIndex: number | null,
  context: CircuitValidationContext<R>,
  detail?: string,
): CircuitValidationError<R> => new CircuitValidationError(reason, circuitIndex, context, detail);

export function isCircuitValidationError(error: unknown): error is CircuitValidationError {
  return error instanceof CircuitValidationError;
}

export function isCircuitValidationReason<R extends CircuitValidationReason>(
  error: unknown,
  reason: R,
): error is CircuitValidationError<R> {
  return isCircuitValidationError(error) && error.reason === reason;
}

const diagnosticPath = (error: CircuitValidationError): string => {
  const circuit = error.circuitIndex === null ? 'circuits' : `circuits[${error.circuitIndex}]`;
  const instructionIndex = Reflect.get(error.context, 'instructionIndex');
  return typeof instructionIndex === 'number' ? `${circuit}.instructions[${instructionIndex}]` : circuit;
};

export const toDiagnostic = (error: CircuitValidationError): Diagnostic => ({
  code: `CIRCUIT_${error.reason.toUpperCase().replaceAll('-', '_')}`,
  path: diagnosticPath(error),
  severity: 'error',
  message: error.detail === undefined
    ? CIRCUIT_VALIDATION_REASON_MESSAGES[error.reason]
    : `${CIRCUIT_VALIDATION_REASON_MESSAGES[error.reason]}: ${error.detail}`,
});

export class ArchitectureDefinitionError extends Error {
  readonly diagnostics: readonly Diagnostic[];

  constructor(diagnostics: readonly Diagnostic[]) {
    const summary = summarizeDiagnostics(diagnostics);
    super(
      summary.length === 0
        ? 'Invalid architecture: validation failed with at least one error diagnostic.'
        : `Invalid architecture: validation failed (${summary}).`,
    );
    this.name = 'ArchitectureDefinitionError';
    this.diagnostics = diagnostics;
  }
}
