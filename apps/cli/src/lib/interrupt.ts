/**
 * Interrupt handling for long-running commands.
 *
 * The first SIGINT/SIGTERM aborts the returned signal. Later ones only
 * notify: the listeners stay installed until dispose(), so a repeated
 * Ctrl+C cannot kill the process before cleanup has finished.
 */

const SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

type SignalListener = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(event: NodeJS.Signals, listener: SignalListener): unknown;
  off(event: NodeJS.Signals, listener: SignalListener): unknown;
}

export interface InterruptHandle {
  readonly signal: AbortSignal;
  dispose(): void;
}

export function handleInterrupts(
  onFirst: (signal: NodeJS.Signals) => void,
  onRepeat: (signal: NodeJS.Signals) => void = () => {},
  source: SignalSource = process
): InterruptHandle {
  const controller = new AbortController();

  const listener: SignalListener = signal => {
    if (controller.signal.aborted) {
      onRepeat(signal);
      return;
    }
    onFirst(signal);
    controller.abort();
  };

  for (const name of SIGNALS) {
    source.on(name, listener);
  }

  return {
    signal: controller.signal,
    dispose: () => {
      for (const name of SIGNALS) {
        source.off(name, listener);
      }
    },
  };
}
