import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import {
  isMoveOperation,
  MOVE_SANDWICH_ALLOWED_ROLES,
  resolveOperation,
  resolveValidationOptions,
  SUPPORTED_OPERATIONS,
  type OperationTable,
} from '../../../src/kernel/index.js';

describe('operation descriptors', () => {
  it('resolves canonical operations without an alias', () => {
    const resolution = resolveOperation('cz');

    assert.equal(resolution?.alias, null);
    assert.equal(resolution?.descriptor.symmetric, true);
    assert.equal(resolution?.descriptor.arity, 2);
  });

  it('resolves deprecated aliases to their canonical descriptor', () => {
    assert.deepEqual(
      ['measurement', 'phased_rx'].map((name) => {
        const resolution = resolveOperation(name);
        return [resolution?.descriptor.name, resolution?.alias];
      }),
      [
        ['measure', 'measurement'],
        ['prx', 'phased_rx'],
      ],
    );
  });

  it('does not resolve unknown names or inherited object keys', () => {
    assert.equal(resolveOperation('swap'), undefined);
    assert.equal(resolveOperation('toString'), undefined);
  });

  it('flags calibration-free and factorizable operations', () => {
    assert.equal(SUPPORTED_OPERATIONS['barrier']?.noCalibrationNeeded, true);
    assert.equal(SUPPORTED_OPERATIONS['reset_wait']?.noCalibrationNeeded, true);
    assert.equal(SUPPORTED_OPERATIONS['measure']?.factorizable, true);
    assert.equal(SUPPORTED_OPERATIONS['prx']?.noCalibrationNeeded, false);
  });

  it('identifies MOVE through the descriptor role', () => {
    const moveDescriptor = SUPPORTED_OPERATIONS['move'];
    assert.ok(moveDescriptor);
    const renamed: OperationTable = {
      ...SUPPORTED_OPERATIONS,
      park: { ...moveDescriptor, name: 'park' },
    };

    assert.equal(isMoveOperation('move', SUPPORTED_OPERATIONS), true);
    assert.equal(isMoveOperation('park', renamed), true);
    assert.equal(isMoveOperation('cz', SUPPORTED_OPERATIONS), false);
  });
});

describe('resolveValidationOptions', () => {
  it('fills defaults', () => {
    const options = resolveValidationOptions();

    assert.equal(options.qubitMapping, null);
    assert.equal(options.moveValidation, 'strict');
    assert.equal(options.mustCloseSandwiches, true);
    assert.equal(options.checkStructure, true);
    assert.equal(options.trace, false);
    assert.equal(options.operations, SUPPORTED_OPERATIONS);
    assert.deepEqual([...options.sandwichAllowedRoles], ['barrier']);
  });

  it('derives the sandwich allow-list from the MOVE validation mode', () => {
    assert.deepEqual(
      [...resolveValidationOptions({ moveValidation: 'allow-prx' }).sandwichAllowedRoles],
      ['barrier', 'single-qubit-rotation'],
    );
    assert.deepEqual(MOVE_SANDWICH_ALLOWED_ROLES.none, []);
  });

  it('lets an explicit role list replace the mode allow-list', () => {
    const options = resolveValidationOptions({ moveValidation: 'strict', sandwichAllowedRoles: ['delay'] });

    assert.deepEqual([...options.sandwichAllowedRoles], ['delay']);
  });
});
