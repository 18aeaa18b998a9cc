export type DeadlineHandle = {
  /**
   * Disarms the deadline if it has not fired yet. Returns false once it has,
   * in which case the caller has lost the race and must not commit anything.
   */
  stop: () => boolean;
};

/**
 * Races `promise` against a deadline. On expiry `controller` is aborted with the
 * error built by `onTimeout`, which is also thrown; the original promise keeps running and
 * its eventual outcome is handed to `onLate`. `onStart` receives a handle that lets the
 * work claim the win before a final side effect.
 */
export function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  options: {
    controller?: AbortController;
    onTimeout: () => Error;
    onLate?: (outcome: { value?: T; error?: unknown }) => void;
    onStart?: (handle: DeadlineHandle) => void;
  }
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  let expired = false;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      expired = true;
      const error = options.onTimeout();
      options.controller?.abort(error);
      reject(error);
    }, ms);
  });
  // a stopped deadline never settles; the race then follows `promise` alone
  deadline.catch(() => undefined);

  options.onStart?.({
    stop: () => {
      if (expired) {
        return false;
      }
      clearTimeout(timer);
      return true;
    },
  });

  const tracked = promise.then(
    (value) => {
      if (expired) {
        options.onLate?.({ value });
      }
      return value;
    },
    (error: unknown) => {
      if (expired) {
        options.onLate?.({ error });
      }
      throw error;
    }
  );
  // once the deadline wins, the tracked rejection is reported through onLate
  tracked.catch(() => undefined);

  return Promise.race([tracked, deadline]).finally(() => {
    clearTimeout(timer);
  });
}
