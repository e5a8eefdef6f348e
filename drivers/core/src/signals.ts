export interface LinkedSignal {
  signal: AbortSignal;
  cleanup: () => void;
}

/**
 * Signal that aborts when `parent` aborts or after `timeoutMs`, whichever
 * comes first. Call `cleanup` once the guarded operation settles.
 */
export function linkSignal(parent: AbortSignal, timeoutMs?: number): LinkedSignal {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  if (parent.aborted) {
    controller.abort(parent.reason);
  } else {
    const onAbort = () => {
      controller.abort(parent.reason);
    };
    parent.addEventListener("abort", onAbort, { once: true });
    cleanups.push(() => parent.removeEventListener("abort", onAbort));
  }

  if (typeof timeoutMs === "number") {
    const timeoutHandle = setTimeout(() => {
      controller.abort(new Error(`Timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    cleanups.push(() => clearTimeout(timeoutHandle));
  }

  return {
    signal: controller.signal,
    cleanup: () => cleanups.forEach((fn) => fn())
  };
}

/** Resolves after `ms`; rejects with the abort reason if `signal` aborts first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}
