/*
Purpose: turn SIGINT/SIGTERM into a stop request the scheduler checks between tasks.
Assumptions: a second signal means the operator wants out now.
Usage: const stop = createRunStopSignalHandler({ onSignal }); ...; stop.cleanup();
*/

const DEFAULT_SIGNALS: NodeJS.Signals[] = ["SIGINT", "SIGTERM"];
const FORCED_EXIT_CODE = 130;

export type RunStopSignalHandler = {
  signal: AbortSignal;
  cleanup: () => void;
};

export function createRunStopSignalHandler(
  opts: {
    onSignal?: (signal: NodeJS.Signals) => void;
    signals?: NodeJS.Signals[];
  } = {},
): RunStopSignalHandler {
  const controller = new AbortController();
  const signals = opts.signals ?? DEFAULT_SIGNALS;

  const handler = (signal: NodeJS.Signals): void => {
    if (controller.signal.aborted) {
      process.exit(FORCED_EXIT_CODE);
    }
    opts.onSignal?.(signal);
    controller.abort(signal);
  };

  for (const signal of signals) {
    process.on(signal, handler);
  }

  return {
    signal: controller.signal,
    cleanup: () => {
      for (const signal of signals) {
        process.off(signal, handler);
      }
    },
  };
}
