export const CIRCUIT_VALIDATION_REASONS = [
  'unknown-operation',
  'unsupported-operation',
  'unsupported-implementation',
  'locus-not-allowed',
  'non-injective-mapping',
  'unmapped-qubits',
  'unmapped-target-missing',
  'duplicate-measurement-key',
  'move-invalid-locus',
  'move-split-state',
  'move-mismatched-close',
  'move-qubit-in-use',
  'move-unsupported',
  'move-unclosed-sandwich',
  'invalid-circuit',
  'invalid-instruction',
] as const;

export type CircuitValidationReason = (typeof CIRCUIT_VALIDATION_REASONS)[number];

export const CIRCUIT_VALIDATION_REASON_MESSAGES: Readonly<Record<CircuitValidationReason, string>> = {
  'unknown-operation': 'unknown quantum operation',
  'unsupported-operation': 'operation not supported by this architecture',
  'unsupported-implementation': 'implementation not supported by this architecture',
  'locus-not-allowed': 'locus not allowed for this operation',
  'non-injective-mapping': 'multiple logical qubits map to the same physical component',
  'unmapped-qubits': 'qubits not found in the qubit mapping',
  'unmapped-target-missing': 'mapped component not present in the architecture',
  'duplicate-measurement-key': 'measurement key is not unique within the circuit',
  'move-invalid-locus': 'MOVE is only allowed from a qubit to a computational resonator',
  'move-split-state': 'qubit state is already parked in another resonator',
  'move-mismatched-close': 'MOVE into a resonator occupied by another qubit',
  'move-qubit-in-use': 'instruction acts on a qubit whose state is currently parked in a resonator',
  'move-unsupported': 'MOVE is not supported by this architecture',
  'move-unclosed-sandwich': 'circuit ends with an unclosed MOVE sandwich',
  'invalid-circuit': 'circuit is malformed',
  'invalid-instruction': 'instruction is malformed',
};

export const LOCUS_RULES = ['known-components', 'factorizable', 'symmetric', 'exact'] as const;
export type LocusRule = (typeof LOCUS_RULES)[number];

export const INSTRUCTION_VIOLATIONS = [
  'empty-locus',
  'duplicate-locus-component',
  'arity',
  'missing-argument',
  'unknown-argument',
  'argument-type',
] as const;
export type InstructionViolation = (typeof INSTRUCTION_VIOLATIONS)[number];
