/**
 * SIGINT / SIGTERM handling for commands that drain before exiting
 */

import { warn } from './output.js';

type StopListener = (signal: NodeJS.Signals) => void;

export interface SignalSource {
  on(event: NodeJS.Signals, listener: StopListener): unknown;
  off(event: NodeJS.Signals, listener: StopListener): unknown;
}

export interface StopTrap {
  /** Aborted by the first signal */
  signal: AbortSignal;
  /** Remove the handlers; default signal handling applies again */
  release(): void;
}

export interface StopTrapOptions {
  source?: SignalSource;
  exit?: (code: number) => void;
  notify?: (message: string) => void;
}

const STOP_SIGNALS: NodeJS.Signals[] = ['SIGINT', 'SIGTERM'];

/**
 * Trap stop signals while a pipeline runs. The first signal aborts the
 * returned signal so in-flight items finish and the checkpoint is saved;
 * a second one exits immediately with status 130.
 */
export function trapStopSignals(options: StopTrapOptions = {}): StopTrap {
  const source = options.source ?? process;
  const exit = options.exit ?? ((code: number) => process.exit(code));
  const notify = options.notify ?? warn;
  const controller = new AbortController();

  const onSignal: StopListener = (signal) => {
    if (controller.signal.aborted) {
      notify(`${signal} received again; exiting without waiting (resume picks up from the last checkpoint save)`);
      exit(130);
      return;
    }
    notify(`${signal} received; finishing in-flight items and saving the checkpoint`);
    controller.abort();
  };

  for (const name of STOP_SIGNALS) {
    source.on(name, onSignal);
  }

  return {
    signal: controller.signal,
    release: () => {
      for (const name of STOP_SIGNALS) {
        source.off(name, onSignal);
      }
    },
  };
}
