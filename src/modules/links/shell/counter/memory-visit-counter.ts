/**
 * In-memory visit counter store.
 *
 * Only correct for a single process; used when no Redis is configured
 * outside production, and in tests.
 */

import { ok, type Result } from 'neverthrow';

import type { CounterStoreUnavailableError } from '../../core/errors.js';
import type { VisitCounterStore } from '../../core/ports.js';

export const makeMemoryVisitCounter = (): VisitCounterStore => {
  const pending = new Map<string, number>();
  const inflight = new Map<string, number>();

  const deltaOf = (code: string): number => (pending.get(code) ?? 0) + (inflight.get(code) ?? 0);

  return {
    increment(code: string, by = 1): Promise<Result<number, CounterStoreUnavailableError>> {
      const value = (pending.get(code) ?? 0) + by;
      pending.set(code, value);
      return Promise.resolve(ok(value));
    },

    takeAndReset(code: string): Promise<Result<number, CounterStoreUnavailableError>> {
      const taken = pending.get(code);
      pending.delete(code);
      if (taken !== undefined) {
        inflight.set(code, (inflight.get(code) ?? 0) + taken);
      }
      return Promise.resolve(ok(inflight.get(code) ?? 0));
    },

    acknowledge(code: string, delta: number): Promise<Result<void, CounterStoreUnavailableError>> {
      const left = (inflight.get(code) ?? 0) - delta;
      if (left === 0) {
        inflight.delete(code);
      } else {
        inflight.set(code, left);
      }
      return Promise.resolve(ok(undefined));
    },

    peek(code: string): Promise<Result<number, CounterStoreUnavailableError>> {
      return Promise.resolve(ok(deltaOf(code)));
    },

    peekMany(
      codes: readonly string[]
    ): Promise<Result<Map<string, number>, CounterStoreUnavailableError>> {
      return Promise.resolve(ok(new Map(codes.map((code) => [code, deltaOf(code)]))));
    },

    listPendingCodes(): Promise<Result<string[], CounterStoreUnavailableError>> {
      return Promise.resolve(ok([...new Set([...inflight.keys(), ...pending.keys()])]));
    },
  };
};
