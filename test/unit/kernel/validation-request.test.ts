import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';
import { fileURLToPath } from 'node:url';

import {
  loadValidationRequestFromFile,
  parseValidationRequest,
  validateLoadedRequest,
} from '../../../src/kernel/index.js';
import { createTestArchitectureDef } from '../../helpers/circuit-fixtures.js';

const fixturePath = (name: string): string => fileURLToPath(new URL(`../../fixtures/requests/${name}`, import.meta.url));

describe('loadValidationRequestFromFile', () => {
  it('loads a JSON request and validates it through the mapping', () => {
    const { request, diagnostics } = loadValidationRequestFromFile(fixturePath('bell-request.json'));

    assert.deepEqual(diagnostics, []);
    assert.ok(request);
    assert.equal(request.architecture.calibrationSetId, 'cal-fixture-json');
    assert.equal(request.options.qubitMapping?.get('r'), 'R1');

    const report = validateLoadedRequest(request);
    assert.equal(report.instructionCount, 3);
    assert.deepEqual(report.circuits[0]?.instructions, [
      { operation: 'prx', implementation: 'drag_gaussian', locus: ['QB1'] },
      { operation: 'cz', implementation: 'tgss', locus: ['QB2', 'QB1'] },
      { operation: 'measure', implementation: 'constant', locus: ['QB1', 'QB2'] },
    ]);
  });

  it('loads a YAML request with validation options', () => {
    const { request } = loadValidationRequestFromFile(fixturePath('parked-prx.yaml'));

    assert.ok(request);
    assert.equal(request.options.moveValidation, 'allow-prx');
    assert.equal(request.options.qubitMapping, null);
    assert.deepEqual(request.circuits[0]?.instructions[0]?.args, {});

    const report = validateLoadedRequest(request);
    assert.deepEqual(
      report.circuits[0]?.instructions.map((instruction) => instruction.operation),
      ['move', 'prx', 'move'],
    );
    assert.deepEqual(report.warnings, []);
  });

  it('rejects unsupported file extensions before reading', () => {
    const { request, diagnostics } = loadValidationRequestFromFile(fixturePath('request.txt'));

    assert.equal(request, null);
    assert.equal(diagnostics.length, 1);
    assert.equal(diagnostics[0]?.code, 'REQUEST_FORMAT_UNSUPPORTED');
    assert.equal(diagnostics[0]?.message, 'Unsupported request format ".txt".');
  });

  it('reports unreadable files as parse errors', () => {
    const { request, diagnostics } = loadValidationRequestFromFile(fixturePath('truncated.json'));

    assert.equal(request, null);
    assert.equal(diagnostics[0]?.code, 'REQUEST_PARSE_ERROR');
    assert.equal(diagnostics[0]?.path, 'request.file');
    assert.equal(diagnostics[0]?.message.startsWith('Failed to read request file: '), true);
  });

  it('reports schema violations with their request path', () => {
    const { request, diagnostics } = loadValidationRequestFromFile(fixturePath('missing-qubits.json'));

    assert.equal(request, null);
    assert.deepEqual(
      diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.path]),
      [['REQUEST_SCHEMA_INVALID', 'request.circuits.0.instructions.0.qubits']],
    );
  });

  it('reports architecture diagnostics against the source file', () => {
    const source = fixturePath('unknown-locus-component.yaml');
    const { request, diagnostics } = loadValidationRequestFromFile(source);

    assert.equal(request, null);
    assert.equal(diagnostics.length, 1);
    assert.equal(diagnostics[0]?.code, 'ARCH_LOCUS_COMPONENT_UNKNOWN');
    assert.equal(diagnostics[0]?.path, 'request.architecture.gates.prx.implementations.drag_gaussian.loci[1][0]');
    assert.equal(diagnostics[0]?.sourcePath, source);
    assert.equal(diagnostics[0]?.entityId, 'cal-fixture-broken');
    assert.equal(diagnostics[0]?.suggestion, 'Did you mean "QB1"?');
  });
});

describe('parseValidationRequest', () => {
  it('rejects unknown top-level fields', () => {
    const { diagnostics } = parseValidationRequest(
      { architecture: createTestArchitectureDef(), circuits: [], priority: 1 },
      'inline',
    );

    assert.deepEqual(
      diagnostics.map((diagnostic) => [diagnostic.code, diagnostic.path, diagnostic.sourcePath]),
      [['REQUEST_SCHEMA_INVALID', 'request', 'inline']],
    );
  });

  it('accepts an in-memory request', () => {
    const { request } = parseValidationRequest(
      {
        architecture: createTestArchitectureDef(),
        circuits: [{ name: 'single', instructions: [{ name: 'prx', qubits: ['QB2'], args: { angle_t: 1, phase_t: 0 } }] }],
        options: { trace: true },
      },
      'inline',
    );

    assert.ok(request);
    assert.equal(validateLoadedRequest(request).trace?.length, 2);
  });
});
