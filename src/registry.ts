/**
 * Check Registry
 * Layer: core
 *
 * Provided ports:
 *   - registry.add
 *   - registry.remove
 *   - registry.checkAll
 *
 * Named collection of liveness checks. Every operation runs to completion
 * synchronously, so no other task observes a half-applied add or remove,
 * and checkAll evaluates a copy of the entries taken in a single step.
 */

import type { CheckAllOutcome, LivenessCheck } from './types';
import { AggregateFailureError } from './errors';

export class Registry {
  private readonly entries = new Map<string, LivenessCheck>();

  /** Number of registered checks */
  get size(): number {
    return this.entries.size;
  }

  // ---------------------------------------------------------------------------
  // Port: registry.add
  // ---------------------------------------------------------------------------

  /**
   * Inserts a check, replacing any existing check with the same name.
   */
  add(check: LivenessCheck): void {
    this.entries.set(check.name, check);
  }

  // ---------------------------------------------------------------------------
  // Port: registry.remove
  // ---------------------------------------------------------------------------

  /**
   * Removes a check by name (or by the given check's name).
   * Returns true if an entry was removed; absent names are a no-op.
   */
  remove(target: string | LivenessCheck): boolean {
    const name = typeof target === 'string' ? target : target.name;
    return this.entries.delete(name);
  }

  has(name: string): boolean {
    return this.entries.has(name);
  }

  get(name: string): LivenessCheck | undefined {
    return this.entries.get(name);
  }

  /** Registered names, sorted */
  names(): string[] {
    return [...this.entries.keys()].sort();
  }

  // ---------------------------------------------------------------------------
  // Port: registry.checkAll
  // ---------------------------------------------------------------------------

  /**
   * Runs one pass over every registered check.
   * Fails with every expired name (sorted), not only the first.
   */
  checkAll(): CheckAllOutcome {
    const snapshot = [...this.entries.values()];

    const expiredNames: string[] = [];
    for (const check of snapshot) {
      const isExpired = check.expired();
      if (isExpired) {
        expiredNames.push(check.name);
      }
    }

    if (expiredNames.length === 0) {
      return { success: true };
    }
    return { success: false, error: new AggregateFailureError(expiredNames) };
  }
}
