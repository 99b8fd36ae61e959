import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createCollector, validateCircuitMoves } from '../../../src/kernel/index.js';
import {
  barrier,
  circuit,
  createMovelessArchitecture,
  createTestArchitecture,
  move,
  prx,
} from '../../helpers/circuit-fixtures.js';
import { expectValidationFailure } from '../../helpers/validation-error-assertions.js';

describe('validateCircuitMoves', () => {
  const architecture = createTestArchitecture();

  it('accepts a MOVE sandwich closed by the same qubit', () => {
    assert.doesNotThrow(() =>
      validateCircuitMoves(architecture, circuit('sandwich', [move('QB1', 'R1'), move('QB1', 'R1')])),
    );
  });

  it('tracks independent sandwiches on different resonators', () => {
    assert.doesNotThrow(() =>
      validateCircuitMoves(
        architecture,
        circuit('nested', [move('QB1', 'R1'), move('QB3', 'R2'), move('QB3', 'R2'), move('QB1', 'R1')]),
      ),
    );
  });

  it('rejects a strict-mode rotation on a parked qubit', () => {
    const error = expectValidationFailure(
      () =>
        validateCircuitMoves(architecture, circuit('parked', [move('QB1', 'R1'), prx('QB1'), move('QB1', 'R1')]), {
          moveValidation: 'strict',
          circuitIndex: 0,
        }),
      'move-qubit-in-use',
    );

    assert.equal(error.circuitIndex, 0);
    assert.equal(error.context.instructionIndex, 1);
    assert.deepEqual(error.context.parkedQubits, ['QB1']);
    assert.deepEqual(error.context.occupation, { R1: 'QB1' });
    assert.equal(error.detail, 'prx acts on QB1; resonator occupation {R1: QB1}');
  });

  it('allows single-qubit rotations inside a sandwich in relaxed mode', () => {
    assert.doesNotThrow(() =>
      validateCircuitMoves(architecture, circuit('relaxed', [move('QB1', 'R1'), prx('QB1'), move('QB1', 'R1')]), {
        moveValidation: 'allow-prx',
      }),
    );
  });

  it('allows barriers on parked qubits and any gate on other qubits', () => {
    assert.doesNotThrow(() =>
      validateCircuitMoves(
        architecture,
        circuit('bystanders', [move('QB1', 'R1'), barrier('QB1', 'QB2'), prx('QB2'), move('QB1', 'R1')]),
      ),
    );
  });

  it('rejects closing a sandwich with a different qubit', () => {
    const error = expectValidationFailure(
      () => validateCircuitMoves(architecture, circuit('mismatch', [move('QB1', 'R1'), move('QB2', 'R1')])),
      'move-mismatched-close',
    );

    assert.equal(error.context.qubit, 'QB2');
    assert.equal(error.context.resonator, 'R1');
    assert.equal(error.context.occupyingQubit, 'QB1');
  });

  it('rejects moving a parked qubit into a second resonator', () => {
    const error = expectValidationFailure(
      () => validateCircuitMoves(architecture, circuit('split', [move('QB1', 'R1'), move('QB1', 'R2')])),
      'move-split-state',
    );

    assert.equal(error.context.instructionIndex, 1);
    assert.equal(error.context.occupiedResonator, 'R1');
    assert.equal(error.context.resonator, 'R2');
  });

  it('requires a qubit first and a resonator second', () => {
    for (const qubits of [
      ['R1', 'QB1'],
      ['QB1', 'QB2'],
    ]) {
      const error = expectValidationFailure(
        () => validateCircuitMoves(architecture, circuit('swapped', [{ name: 'move', qubits, args: {} }])),
        'move-invalid-locus',
      );
      assert.deepEqual(error.context.locus, qubits);
    }
  });

  it('rejects circuits that end with a parked qubit when closure is required', () => {
    const error = expectValidationFailure(
      () => validateCircuitMoves(architecture, circuit('open', [move('QB1', 'R1')]), { circuitIndex: 3 }),
      'move-unclosed-sandwich',
    );

    assert.equal(error.circuitIndex, 3);
    assert.deepEqual(error.context, { occupation: { R1: 'QB1' } });
  });

  it('tolerates an open sandwich when closure is not required', () => {
    const collector = createCollector();

    validateCircuitMoves(architecture, circuit('open', [move('QB1', 'R1')]), {
      mustCloseSandwiches: false,
      collector,
    });

    assert.deepEqual(
      collector.warnings.map((warning) => [warning.code, warning.context]),
      [['OPEN_SANDWICH_TOLERATED', { circuitIndex: null, occupation: { R1: 'QB1' } }]],
    );
  });

  it('rejects MOVE on architectures without a MOVE gate', () => {
    const error = expectValidationFailure(
      () => validateCircuitMoves(createMovelessArchitecture(), circuit('moveless', [prx('QB1'), move('QB1', 'R1')])),
      'move-unsupported',
    );

    assert.equal(error.context.instructionIndex, 1);
  });

  it('is a no-op without MOVE support when the circuit has no MOVE', () => {
    assert.doesNotThrow(() => validateCircuitMoves(createMovelessArchitecture(), circuit('plain', [prx('QB1')])));
  });

  it('skips every check when MOVE validation is disabled', () => {
    assert.doesNotThrow(() =>
      validateCircuitMoves(architecture, circuit('unchecked', [move('QB1', 'R1'), prx('QB1'), move('QB2', 'R1')]), {
        moveValidation: 'none',
      }),
    );
  });

  it('tracks occupancy in physical names when a mapping is supplied', () => {
    const mapping = new Map([
      ['a', 'QB1'],
      ['r', 'R1'],
    ]);
    const error = expectValidationFailure(
      () => validateCircuitMoves(architecture, circuit('logical', [move('a', 'r'), prx('a')]), { qubitMapping: mapping }),
      'move-qubit-in-use',
    );

    assert.deepEqual(error.context.locus, ['a']);
    assert.deepEqual(error.context.mappedLocus, ['QB1']);
    assert.deepEqual(error.context.parkedQubits, ['QB1']);
  });

  it('traces sandwich open and close events', () => {
    const collector = createCollector({ trace: true });

    validateCircuitMoves(architecture, circuit('traced', [move('QB2', 'R1'), move('QB2', 'R1')]), {
      circuitIndex: 4,
      collector,
    });

    assert.deepEqual(collector.trace, [
      { kind: 'moveSandwichOpened', circuitIndex: 4, instructionIndex: 0, qubit: 'QB2', resonator: 'R1' },
      { kind: 'moveSandwichClosed', circuitIndex: 4, instructionIndex: 1, qubit: 'QB2', resonator: 'R1' },
    ]);
  });

  it('enforces sandwich pairing in relaxed mode as well', () => {
    const mismatched = expectValidationFailure(
      () =>
        validateCircuitMoves(architecture, circuit('swap-back', [move('QB1', 'R1'), prx('QB1'), move('QB2', 'R1')]), {
          moveValidation: 'allow-prx',
        }),
      'move-mismatched-close',
    );
    assert.equal(mismatched.context.instructionIndex, 2);
    assert.equal(mismatched.context.occupyingQubit, 'QB1');

    const split = expectValidationFailure(
      () =>
        validateCircuitMoves(architecture, circuit('split', [move('QB1', 'R1'), move('QB1', 'R2')]), {
          moveValidation: 'allow-prx',
        }),
      'move-split-state',
    );
    assert.equal(split.context.instructionIndex, 1);
    assert.equal(split.context.occupiedResonator, 'R1');
  });
});
