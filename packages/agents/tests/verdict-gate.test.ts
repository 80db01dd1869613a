// Tests for verdict parsing and the VerdictGate wrapper

import { describe, it, expect } from 'vitest';
import { VerdictGate, parseVerdict } from '../kernel/verdict-gate.js';
import { ContextStore } from '../kernel/context-store.js';
import { ContractViolation, StageFailure } from '../kernel/errors.js';
import { fakeStage, testScope } from './stage-fixtures.js';

describe('parseVerdict', () => {
  it('accepts an accept verdict without reasons', () => {
    expect(parseVerdict({ outcome: 'accept', reasons: [] }, 'gate')).toEqual({ outcome: 'accept', reasons: [] });
  });

  it('trims reasons and drops blank ones', () => {
    const verdict = parseVerdict({ outcome: 'revise', reasons: ['  unsupported margin claim ', ''] }, 'gate');
    expect(verdict).toEqual({ outcome: 'revise', reasons: ['unsupported margin claim'] });
    expect(Object.isFrozen(verdict)).toBe(true);
  });

  it('rejects revise without any real reason', () => {
    expect(() => parseVerdict({ outcome: 'revise', reasons: ['   '] }, 'gate'))
      .toThrow('Gate "gate" returned "revise" without reasons');
  });

  it.each([
    ['missing', undefined],
    ['unknown outcome', { outcome: 'maybe', reasons: [] }],
    ['non-string reason', { outcome: 'revise', reasons: [42] }],
  ])('rejects a malformed verdict (%s)', (_label, value) => {
    expect(() => parseVerdict(value, 'gate')).toThrow(ContractViolation);
  });
});

describe('VerdictGate', () => {
  it('requires the stage to declare the verdict write', () => {
    expect(() => new VerdictGate(fakeStage('gate', { writes: ['other'] }))).toThrow(ContractViolation);
  });

  it('merges the verdict into the context and returns it', async () => {
    const gate = new VerdictGate(fakeStage('gate', {
      writes: ['verdict'],
      run: () => ({ verdict: { outcome: 'revise', reasons: ['price target not in reports'] } }),
    }));
    const store = new ContextStore({ decision: 'BUY' });

    const verdict = await gate.evaluate(store, testScope().scope);

    expect(verdict).toEqual({ outcome: 'revise', reasons: ['price target not in reports'] });
    expect(store.snapshot().verdict).toEqual({ outcome: 'revise', reasons: ['price target not in reports'] });
  });

  it('wraps a failing gate stage as a StageFailure', async () => {
    const gate = new VerdictGate(fakeStage('gate', {
      writes: ['verdict'],
      run: () => {
        throw new Error('oracle unavailable');
      },
    }));

    await expect(gate.evaluate(new ContextStore(), testScope().scope)).rejects.toThrow(StageFailure);
  });

  it('does not merge a malformed verdict', async () => {
    const gate = new VerdictGate(fakeStage('gate', {
      writes: ['verdict'],
      run: () => ({ verdict: 'looks fine' }),
    }));
    const store = new ContextStore();

    await expect(gate.evaluate(store, testScope().scope)).rejects.toThrow(ContractViolation);
    expect(store.version).toBe(0);
  });
});
