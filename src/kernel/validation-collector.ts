import type { ValidationCollector, ValidationTraceEntry, ValidationWarning, ValidationWarningCode } from './types.js';
import type { CircuitValidationOptions } from './validation-options.js';

/** Warnings are always kept; trace entries only when the caller asked for a trace. */
export const createCollector = (options: Pick<CircuitValidationOptions, 'trace'> = {}): ValidationCollector => ({
  warnings: [],
  trace: options.trace === true ? [] : null,
});

export const emitWarning = (
  collector: ValidationCollector | undefined,
  code: ValidationWarningCode,
  message: string,
  context: ValidationWarning['context'],
): void => {
  collector?.warnings.push({ code, message, context });
};

export const emitTrace = (collector: ValidationCollector | undefined, entry: ValidationTraceEntry): void => {
  collector?.trace?.push(entry);
};
