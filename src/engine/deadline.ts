export type DeadlineOutcome<T> =
  | { kind: "completed"; value: T; elapsedMs: number }
  | { kind: "failed"; error: unknown; elapsedMs: number }
  | { kind: "timeout"; elapsedMs: number };

/**
 * Races `task` against a timer. Whichever settles first decides the outcome;
 * a late result or rejection from the task is dropped. When the deadline
 * wins, the signal handed to the task is aborted so it can release sockets.
 */
export function runWithDeadline<T>(
  task: (signal: AbortSignal) => Promise<T>,
  deadlineMs: number,
  now: () => number = Date.now,
): Promise<DeadlineOutcome<T>> {
  const controller = new AbortController();
  const started = now();

  return new Promise<DeadlineOutcome<T>>((resolve) => {
    let settled = false;

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      controller.abort(new Error(`Deadline of ${deadlineMs}ms exceeded`));
      // Timers may fire a millisecond early against the wall clock.
      resolve({ kind: "timeout", elapsedMs: Math.max(deadlineMs, now() - started) });
    }, deadlineMs);

    let pending: Promise<T>;
    try {
      pending = task(controller.signal);
    } catch (error) {
      pending = Promise.reject(error);
    }

    pending.then(
      (value) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({ kind: "completed", value, elapsedMs: now() - started });
      },
      (error: unknown) => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve({ kind: "failed", error, elapsedMs: now() - started });
      },
    );
  });
}
