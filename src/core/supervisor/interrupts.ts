export type InterruptHandler = (signal: NodeJS.Signals) => void;

export interface InterruptSource {
  /** Calls `handler` at most once; the returned function detaches it. */
  listen(handler: InterruptHandler): () => void;
}

export interface SignalTarget {
  on(signal: NodeJS.Signals, listener: InterruptHandler): unknown;
  off(signal: NodeJS.Signals, listener: InterruptHandler): unknown;
}

const SHUTDOWN_SIGNALS: readonly NodeJS.Signals[] = ["SIGINT", "SIGTERM"];

export function createProcessInterruptSource(target: SignalTarget = process): InterruptSource {
  return {
    listen(handler) {
      let fired = false;
      const onSignal = (signal: NodeJS.Signals): void => {
        if (fired) return;
        fired = true;
        handler(signal);
      };
      for (const signal of SHUTDOWN_SIGNALS) {
        target.on(signal, onSignal);
      }
      return () => {
        for (const signal of SHUTDOWN_SIGNALS) {
          target.off(signal, onSignal);
        }
      };
    }
  };
}
