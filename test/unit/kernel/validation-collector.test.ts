import * as assert from 'node:assert/strict';
import { describe, it } from 'node:test';

import { createCollector, emitTrace, emitWarning } from '../../../src/kernel/index.js';

describe('validation collector', () => {
  it('collects warnings and skips trace entries unless tracing is enabled', () => {
    const collector = createCollector();

    emitWarning(collector, 'MOVE_VALIDATION_DISABLED', 'off', {});
    emitTrace(collector, { kind: 'qubitMappingValidated', size: 3 });

    assert.equal(collector.warnings.length, 1);
    assert.equal(collector.trace, null);
  });

  it('records trace entries in emission order when enabled', () => {
    const collector = createCollector({ trace: true });

    emitTrace(collector, { kind: 'qubitMappingValidated', size: 1 });
    emitTrace(collector, { kind: 'circuitValidated', circuitIndex: 0, instructionCount: 0 });

    assert.deepEqual(
      collector.trace?.map((entry) => entry.kind),
      ['qubitMappingValidated', 'circuitValidated'],
    );
  });

  it('ignores emissions without a collector', () => {
    assert.doesNotThrow(() => {
      emitWarning(undefined, 'OPEN_SANDWICH_TOLERATED', 'open', {});
      emitTrace(undefined, { kind: 'qubitMappingValidated', size: 0 });
    });
  });
});
