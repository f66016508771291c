// Transaction Primitive Tests
import { describe, expect, it } from 'vitest';
import { ReentrancyGuard, cloneNested, runAtomically } from './transaction';
import type { Checkpointable } from './transaction';
import { expectCode } from './test-utils';

class Counter implements Checkpointable {
  value = 0;

  checkpoint() {
    const saved = this.value;
    return () => {
      this.value = saved;
    };
  }
}

describe('runAtomically', () => {
  it('should keep changes and return the result on success', () => {
    const counter = new Counter();

    const result = runAtomically([counter], () => {
      counter.value = 5;
      return 'done';
    });

    expect(result).toBe('done');
    expect(counter.value).toBe(5);
  });

  it('should restore every ledger and rethrow on failure', () => {
    const a = new Counter();
    const b = new Counter();
    a.value = 1;
    const failure = new Error('boom');

    expect(() =>
      runAtomically([a, b], () => {
        a.value = 10;
        b.value = 20;
        throw failure;
      })
    ).toThrow(failure);

    expect(a.value).toBe(1);
    expect(b.value).toBe(0);
  });

  it('should restore in reverse checkpoint order', () => {
    const order: string[] = [];
    const ledger = (name: string): Checkpointable => ({
      checkpoint: () => () => {
        order.push(name);
      },
    });

    expect(() =>
      runAtomically([ledger('store'), ledger('dsc'), ledger('weth')], () => {
        throw new Error('abort');
      })
    ).toThrow('abort');

    expect(order).toEqual(['weth', 'dsc', 'store']);
  });
});

describe('cloneNested', () => {
  it('should copy inner maps', () => {
    const source = new Map([['a', new Map([['x', 1n]])]]);

    const copy = cloneNested(source);
    source.get('a')?.set('x', 2n);

    expect(copy.get('a')?.get('x')).toBe(1n);
  });
});

describe('ReentrancyGuard', () => {
  it('should reject entry while held', () => {
    const guard = new ReentrancyGuard();
    const lock = guard.enter('mintDsc');

    const error = expectCode(() => guard.enter('burnDsc'), 'REENTRANT_CALL');

    expect(error.context).toEqual({ operation: 'burnDsc', activeOperation: 'mintDsc' });
    lock.release();
    expect(guard.locked).toBe(false);
  });

  it('should release after run, even when the body throws', () => {
    const guard = new ReentrancyGuard();

    expect(() =>
      guard.run('liquidate', () => {
        expect(guard.locked).toBe(true);
        throw new Error('failed');
      })
    ).toThrow('failed');

    expect(guard.locked).toBe(false);
    expect(guard.run('liquidate', () => 42)).toBe(42);
  });

  it('should ignore a second release of the same token', () => {
    const guard = new ReentrancyGuard();
    const first = guard.enter('depositCollateral');
    first.release();
    const second = guard.enter('redeemCollateral');

    first.release();

    expect(guard.locked).toBe(true);
    second.release();
  });
});
