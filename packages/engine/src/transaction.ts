/**
 * Transaction primitives: ledger checkpoints and the re-entrancy lock.
 *
 * Every engine operation runs inside one transaction. All participating
 * ledgers are checkpointed before the body runs and restored if it throws,
 * so a failed operation leaves no trace.
 */

import { EngineError } from './errors';

// ============================================================================
// Checkpoints
// ============================================================================

/** Restores the ledger to the state captured by `checkpoint()` */
export type Restore = () => void;

export interface Checkpointable {
  checkpoint(): Restore;
}

/**
 * Run `body` against a set of ledgers; on any throw every ledger is rolled back
 * (in reverse checkpoint order) and the error is rethrown.
 */
export function runAtomically<T>(ledgers: readonly Checkpointable[], body: () => T): T {
  const restores = ledgers.map((ledger) => ledger.checkpoint());

  try {
    return body();
  } catch (error) {
    for (let i = restores.length - 1; i >= 0; i--) {
      restores[i]();
    }
    throw error;
  }
}

/** Copy a map of maps so later mutation of the original does not leak in */
export function cloneNested<K, IK, V>(source: Map<K, Map<IK, V>>): Map<K, Map<IK, V>> {
  const copy = new Map<K, Map<IK, V>>();
  for (const [key, inner] of source) {
    copy.set(key, new Map(inner));
  }
  return copy;
}

// ============================================================================
// Re-entrancy Guard
// ============================================================================

/** Held for the duration of one entry-point call */
export interface LockToken {
  readonly operation: string;
  release(): void;
}

export class ReentrancyGuard {
  private holder: string | null = null;

  get locked(): boolean {
    return this.holder !== null;
  }

  /**
   * Acquire the lock. Fails with REENTRANT_CALL while another call holds it.
   */
  enter(operation: string): LockToken {
    if (this.holder !== null) {
      throw new EngineError('REENTRANT_CALL', `Re-entrant call to ${operation} during ${this.holder}`, {
        context: { operation, activeOperation: this.holder },
      });
    }

    this.holder = operation;
    let released = false;

    return {
      operation,
      release: () => {
        if (released) return;
        released = true;
        this.holder = null;
      },
    };
  }

  /**
   * Run `body` while holding the lock; the lock is released on every exit path
   */
  run<T>(operation: string, body: () => T): T {
    const token = this.enter(operation);
    try {
      return body();
    } finally {
      token.release();
    }
  }
}
