export * from './architecture.js';
export * from './diagnostics.js';
export * from './measurement-keys.js';
export * from './move-sandwich.js';
export * from './operations.js';
export * from './qubit-mapping.js';
export * from './schemas.js';
export * from './types.js';
export * from './validate-circuit-structure.js';
export * from './validate-circuits.js';
export * from './validate-instruction.js';
export * from './validation-collector.js';
export * from './validation-error.js';
export * from './validation-options.js';
export * from './validation-reasons.js';
export * from './validation-request.js';
