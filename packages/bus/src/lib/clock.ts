import type { Clock, MetricsRecorder } from '../types.js';

/** Wall-clock time and `setTimeout`-based delays. */
export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms, signal) =>
    new Promise<void>((resolve) => {
      if (signal?.aborted || ms <= 0) {
        resolve();
        return;
      }
      const onAbort = (): void => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      }, ms);
      signal?.addEventListener('abort', onAbort, { once: true });
    }),
};

/** Metrics recorder that discards everything. */
export const noopMetrics: MetricsRecorder = {
  recordCounter: () => {},
  recordGauge: () => {},
};
