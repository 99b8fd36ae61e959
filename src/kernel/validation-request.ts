import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { createArchitectureSnapshot, validateArchitectureDef } from './architecture.js';
import type { Diagnostic } from './diagnostics.js';
import { hasErrorDiagnostics } from './diagnostics.js';
import { ValidationRequestSchema } from './schemas.js';
import type { ArchitectureSnapshot, CircuitBatch, CircuitBatchValidationReport } from './types.js';
import { validateCircuitBatch } from './validate-circuits.js';
import type { CircuitValidationOptions } from './validation-options.js';

export interface LoadedValidationRequest {
  readonly source: string;
  readonly architecture: ArchitectureSnapshot;
  readonly circuits: CircuitBatch;
  readonly options: CircuitValidationOptions;
}

export interface LoadValidationRequestResult {
  readonly request: LoadedValidationRequest | null;
  readonly diagnostics: readonly Diagnostic[];
}

function formatError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function parseValidationRequest(value: unknown, source: string): LoadValidationRequestResult {
  const parsed = ValidationRequestSchema.safeParse(value);
  if (!parsed.success) {
    return {
      request: null,
      diagnostics: parsed.error.issues.map((issue) => ({
        code: 'REQUEST_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `request.${issue.path.join('.')}` : 'request',
        severity: 'error',
        message: issue.message,
        sourcePath: source,
      })),
    };
  }

  const { architecture, circuits, qubitMapping, options } = parsed.data;
  const diagnostics: Diagnostic[] = validateArchitectureDef(architecture).map((diagnostic) => ({
    ...diagnostic,
    path: `request.architecture.${diagnostic.path}`,
    sourcePath: source,
    entityId: architecture.calibrationSetId,
  }));
  if (hasErrorDiagnostics(diagnostics)) {
    return { request: null, diagnostics };
  }

  return {
    request: {
      source,
      architecture: createArchitectureSnapshot(architecture),
      circuits,
      options: {
        ...options,
        qubitMapping: qubitMapping === null || qubitMapping === undefined ? null : new Map(Object.entries(qubitMapping)),
      },
    },
    diagnostics,
  };
}

function readRequestFile(requestPath: string): { readonly value: unknown; readonly diagnostic?: Diagnostic } {
  const extension = extname(requestPath).toLowerCase();
  if (extension !== '.json' && extension !== '.yaml' && extension !== '.yml') {
    return {
      value: null,
      diagnostic: {
        code: 'REQUEST_FORMAT_UNSUPPORTED',
        path: 'request.file',
        severity: 'error',
        message: `Unsupported request format "${extension || '(none)'}".`,
        suggestion: 'Use .json, .yaml, or .yml request files.',
        sourcePath: requestPath,
      },
    };
  }

  try {
    const source = readFileSync(requestPath, 'utf8');
    return {
      value: extension === '.json' ? JSON.parse(source) : parseYaml(source),
    };
  } catch (error) {
    return {
      value: null,
      diagnostic: {
        code: 'REQUEST_PARSE_ERROR',
        path: 'request.file',
        severity: 'error',
        message: `Failed to read request file: ${formatError(error)}.`,
        suggestion: 'Fix file syntax and try loading again.',
        sourcePath: requestPath,
      },
    };
  }
}

export function loadValidationRequestFromFile(requestPath: string): LoadValidationRequestResult {
  const fileResult = readRequestFile(requestPath);
  if (fileResult.diagnostic !== undefined) {
    return {
      request: null,
      diagnostics: [fileResult.diagnostic],
    };
  }
  return parseValidationRequest(fileResult.value, requestPath);
}

export const validateLoadedRequest = (request: LoadedValidationRequest): CircuitBatchValidationReport =>
  validateCircuitBatch(request.architecture, request.circuits, request.options);
