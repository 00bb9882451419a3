// src/cli/interrupts.ts

export type InterruptSignal = 'SIGINT' | 'SIGTERM' | 'SIGHUP';

export const INTERRUPT_SIGNALS: readonly InterruptSignal[] = ['SIGINT', 'SIGTERM', 'SIGHUP'];

/** Conventional 128 + signal number. */
export const INTERRUPT_EXIT_CODES: Record<InterruptSignal, number> = {
  SIGHUP: 129,
  SIGINT: 130,
  SIGTERM: 143,
};

export interface SignalSource {
  on(event: InterruptSignal, listener: () => void): unknown;
  off(event: InterruptSignal, listener: () => void): unknown;
}

export interface InterruptActions {
  stop(): void;
  /** Returns how many running downloads were signalled. */
  abort(signal: NodeJS.Signals): number;
}

/**
 * The first Ctrl+C asks the queue to stop after the current item. A second
 * Ctrl+C, SIGTERM or SIGHUP also ends the running download: SIGTERM first,
 * SIGKILL on every later signal.
 */
export class InterruptHandler {
  private stopping: boolean = false;
  private aborts: number = 0;
  private interruptedBy: InterruptSignal | null = null;
  private readonly listeners = new Map<InterruptSignal, () => void>();

  constructor(
    private readonly actions: InterruptActions,
    private readonly source: SignalSource = process
  ) {}

  install(): void {
    for (const signal of INTERRUPT_SIGNALS) {
      if (this.listeners.has(signal)) continue;
      const listener = () => this.handle(signal);
      this.listeners.set(signal, listener);
      this.source.on(signal, listener);
    }
  }

  dispose(): void {
    for (const [signal, listener] of this.listeners) {
      this.source.off(signal, listener);
    }
    this.listeners.clear();
  }

  /** The signal that aborted the run, if one did. */
  getInterruptedBy(): InterruptSignal | null {
    return this.interruptedBy;
  }

  private handle(signal: InterruptSignal): void {
    if (signal === 'SIGINT' && !this.stopping) {
      this.stopping = true;
      console.error('[INFO] Stopping after the current item. Press Ctrl+C again to abort it.');
      this.actions.stop();
      return;
    }

    this.stopping = true;
    if (this.interruptedBy === null) {
      this.interruptedBy = signal;
    }
    this.actions.stop();

    const kill: NodeJS.Signals = this.aborts === 0 ? 'SIGTERM' : 'SIGKILL';
    this.aborts += 1;
    const count = this.actions.abort(kill);
    console.error(`[WARN] Aborting on ${signal}: sent ${kill} to ${count} running download(s)`);
  }
}
