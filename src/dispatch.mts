/** How long the webhook waits for a deployment before answering "accepted". */
export const DISPATCH_GRACE_MS = 500;

export type Dispatched<T> =
  | { state: "settled"; value: T }
  | { state: "failed"; error: unknown }
  | { state: "running" };

/**
 * Races a started task against a short timer. A task that settles within the
 * grace period reports its result; otherwise it keeps running detached and
 * `running` is returned. A detached task's later rejection goes to `onLateError`.
 * @param task The already started work.
 * @param onLateError Receives a rejection that happens after the grace period.
 * @param graceMs How long to wait before answering `running`.
 */
export async function dispatch<T>(
  task: Promise<T>,
  onLateError: (error: unknown) => void,
  graceMs: number = DISPATCH_GRACE_MS
): Promise<Dispatched<T>> {
  let timer: NodeJS.Timeout | undefined;
  const grace = new Promise<Dispatched<T>>((resolve) => {
    timer = setTimeout(() => resolve({ state: "running" }), graceMs);
  });

  const outcome = task.then(
    (value): Dispatched<T> => ({ state: "settled", value }),
    (error: unknown): Dispatched<T> => ({ state: "failed", error })
  );

  try {
    const result = await Promise.race([outcome, grace]);
    if (result.state === "running") {
      void outcome.then((late) => {
        if (late.state === "failed") {
          onLateError(late.error);
        }
      });
    }
    return result;
  } finally {
    clearTimeout(timer);
  }
}
