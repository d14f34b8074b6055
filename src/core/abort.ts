/**
 * Abort signal plumbing shared by the query service and tool HTTP calls.
 */

export interface LinkedSignal {
  signal: AbortSignal;
  /** Detach listeners; call once the guarded work has settled */
  dispose(): void;
}

/**
 * Derive one signal that aborts when any of the given signals aborts,
 * carrying that signal's reason.
 */
export function linkSignals(...signals: Array<AbortSignal | undefined>): LinkedSignal {
  const controller = new AbortController();
  const cleanups: Array<() => void> = [];

  for (const source of signals) {
    if (!source) continue;
    if (source.aborted) {
      controller.abort(source.reason);
      break;
    }
    const onAbort = () => controller.abort(source.reason);
    source.addEventListener('abort', onAbort, { once: true });
    cleanups.push(() => source.removeEventListener('abort', onAbort));
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const cleanup of cleanups) cleanup();
    },
  };
}

/**
 * Signal that aborts with the reason produced by `reason()` after `ms`.
 */
export function deadline(ms: number, reason: () => unknown): LinkedSignal {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(reason()), ms);
  return {
    signal: controller.signal,
    dispose: () => clearTimeout(timer),
  };
}
