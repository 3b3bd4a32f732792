import { describe, it } from 'node:test';
import { strict as assert } from 'node:assert';
import { canTransition, creationStatus, isTerminal } from './transitions.js';
import { STATUSES, Status } from '../types/contracts.js';

describe('canTransition', () => {
  const allowedTransitions: Record<Status, Status[]> = {
    new: ['assigned', 'escalated', 'auto_resolved'],
    assigned: ['escalated', 'resolved'],
    escalated: ['resolved'],
    auto_resolved: [],
    resolved: []
  };

  it('allows the lifecycle transitions', () => {
    for (const from of STATUSES) {
      for (const to of allowedTransitions[from]) {
        assert.equal(canTransition(from, to), true, `Transition from ${from} to ${to} should be allowed`);
      }
    }
  });

  it('disallows everything else', () => {
    for (const from of STATUSES) {
      for (const to of STATUSES) {
        if (!allowedTransitions[from].includes(to)) {
          assert.equal(canTransition(from, to), false, `Transition from ${from} to ${to} should be disallowed`);
        }
      }
    }
  });

  it('disallows self-transitions', () => {
    for (const status of STATUSES) {
      assert.equal(canTransition(status, status), false, `Self-transition for ${status} should be disallowed`);
    }
  });

  it('never leaves a terminal status', () => {
    for (const to of STATUSES) {
      assert.equal(canTransition('resolved', to), false);
      assert.equal(canTransition('auto_resolved', to), false);
    }
  });
});

describe('isTerminal', () => {
  it('is true only for the resolved statuses', () => {
    assert.deepEqual(STATUSES.filter(isTerminal), ['auto_resolved', 'resolved']);
  });
});

describe('creationStatus', () => {
  it('routes low to auto_resolved, medium to assigned and high to escalated', () => {
    assert.equal(creationStatus('low'), 'auto_resolved');
    assert.equal(creationStatus('medium'), 'assigned');
    assert.equal(creationStatus('high'), 'escalated');
  });
});
