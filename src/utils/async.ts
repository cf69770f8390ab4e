/**
 * @fileoverview Async Utilities
 *
 * Deadline helpers shared by the orchestrator.
 *
 * @packageDocumentation
 */

export type DeadlineOutcome<T> =
  | { readonly kind: 'settled'; readonly value: T }
  | { readonly kind: 'rejected'; readonly error: unknown }
  | { readonly kind: 'deadline' };

/**
 * Race a promise against an absolute deadline (epoch ms).
 *
 * Unlike a throwing timeout, the outcome is returned as data: the caller
 * decides what a missed deadline means. The timer is always cleared, and a
 * promise that settles after the deadline is left to `onLate`, so a late
 * rejection never surfaces as an unhandled one.
 *
 * @example
 * ```typescript
 * const outcome = await raceDeadline(worker.run(ctx), Date.now() + 5000, {
 *   onLate: (late) => logDebug('late result ignored', { kind: late.kind }),
 * });
 * if (outcome.kind === 'deadline') controller.abort();
 * ```
 */
export async function raceDeadline<T>(
  promise: Promise<T>,
  deadline: number,
  options: {
    now?: () => number;
    onLate?: (outcome: Exclude<DeadlineOutcome<T>, { kind: 'deadline' }>) => void;
  } = {}
): Promise<DeadlineOutcome<T>> {
  const now = options.now ?? Date.now;
  let closed = false;

  const settled = promise.then(
    (value): DeadlineOutcome<T> => {
      if (closed) options.onLate?.({ kind: 'settled', value });
      return { kind: 'settled', value };
    },
    (error: unknown): DeadlineOutcome<T> => {
      if (closed) options.onLate?.({ kind: 'rejected', error });
      return { kind: 'rejected', error };
    }
  );

  const remaining = deadline - now();
  if (!Number.isFinite(remaining)) {
    return settled;
  }

  let timeoutId: ReturnType<typeof setTimeout> | null = null;
  try {
    return await Promise.race([
      settled,
      new Promise<DeadlineOutcome<T>>((resolve) => {
        timeoutId = setTimeout(() => resolve({ kind: 'deadline' }), Math.max(0, remaining));
      }),
    ]);
  } finally {
    closed = true;
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
