// src/core/queue/worker.ts
import { DownloaderError, ErrorCode, toDownloaderError } from '../errors.js';
import type { ProgressSink, TitleProbe } from '../extract/client.js';
import {
  doneEvent,
  errorEvent,
  mapRawProgress,
  startingEvent,
  titleEvent,
} from '../progress/mapper.js';
import type {
  DownloadOptions,
  ProgressEvent,
  QueueItem,
  RunOutcome,
  RunState,
  WorkerState,
} from '../types/index.js';

/** The part of the extraction client the worker drives. */
export interface Downloader {
  resolveTitle(url: string): Promise<TitleProbe>;
  download(url: string, sink: ProgressSink): Promise<void>;
}

export type DownloaderFactory = (options: DownloadOptions) => Downloader;

export type ProgressListener = (index: number, event: ProgressEvent) => void;
export type FinishedListener = (outcome: RunOutcome) => void;

type WorkerMessage =
  | { kind: 'progress'; index: number; event: ProgressEvent }
  | { kind: 'finished'; outcome: RunOutcome };

export interface QueueWorkerOptions {
  verbose?: boolean;
}

/**
 * Runs queued items one at a time. Events are queued and handed to listeners
 * on a later turn of the event loop, never from inside the call that produced
 * them, and always in production order.
 */
export class QueueWorker {
  private state: WorkerState = 'idle';
  private run?: RunState;
  private readonly progressListeners: ProgressListener[] = [];
  private readonly finishedListeners: FinishedListener[] = [];
  private outbox: WorkerMessage[] = [];
  private flushScheduled: boolean = false;
  private drainWaiters: Array<() => void> = [];
  private readonly verbose: boolean;

  constructor(
    private readonly createDownloader: DownloaderFactory,
    options: QueueWorkerOptions = {}
  ) {
    this.verbose = options.verbose ?? false;
  }

  getState(): WorkerState {
    return this.state;
  }

  onProgress(listener: ProgressListener): () => void {
    this.progressListeners.push(listener);
    return () => remove(this.progressListeners, listener);
  }

  onFinished(listener: FinishedListener): () => void {
    this.finishedListeners.push(listener);
    return () => remove(this.finishedListeners, listener);
  }

  /**
   * Processes `items` in order and resolves once the run-finished signal has
   * been delivered. Rejects immediately if another run is active.
   */
  async start(items: readonly QueueItem[], options: DownloadOptions): Promise<RunOutcome> {
    if (this.state === 'running') {
      throw new DownloaderError(
        ErrorCode.RUN_ACTIVE,
        'A run is already in progress',
        false,
        'Wait for the current run to finish or stop it first'
      );
    }

    const run: RunState = {
      items: Object.freeze(items.map((item) => Object.freeze({ url: item.url }))),
      options: Object.freeze({ ...options }),
      stopRequested: false,
    };
    const downloader = this.createDownloader(run.options);
    this.run = run;
    this.state = 'running';

    let outcome: RunOutcome = 'completed';
    try {
      for (const [index, item] of run.items.entries()) {
        if (run.stopRequested) {
          outcome = 'stopped';
          break;
        }
        await this.processItem(index, item, downloader);
      }
    } finally {
      this.state = outcome;
      this.run = undefined;
      this.post({ kind: 'finished', outcome });
    }

    await this.drained();
    return outcome;
  }

  /** Requests a halt before the next item. Safe to call at any time, any number of times. */
  stop(): void {
    if (this.run) {
      this.run.stopRequested = true;
    }
  }

  private async processItem(index: number, item: QueueItem, downloader: Downloader): Promise<void> {
    this.emit(index, startingEvent());

    const probe = await this.probeTitle(downloader, item.url);
    if (probe.ok) {
      this.emit(index, titleEvent(probe.title));
    } else if (this.verbose) {
      console.error(`[INFO] Title lookup skipped for ${item.url}: ${probe.reason}`);
    }

    const sink = this.bindSink(index);
    try {
      await downloader.download(item.url, sink.accept);
      sink.close();
      this.emit(index, doneEvent());
    } catch (error) {
      sink.close();
      this.emit(index, errorEvent(toDownloaderError(error)));
    }
  }

  private async probeTitle(downloader: Downloader, url: string): Promise<TitleProbe> {
    try {
      return await downloader.resolveTitle(url);
    } catch (error) {
      return { ok: false, reason: error instanceof Error ? error.message : String(error) };
    }
  }

  /**
   * Per-item sink: percent never goes backwards or past 100, merging is
   * reported once, and progress of a later stream after merging began is
   * dropped.
   */
  private bindSink(index: number): { accept: ProgressSink; close: () => void } {
    let highWater = 0;
    let merging = false;
    let closed = false;

    const accept: ProgressSink = (raw) => {
      if (closed) return;
      const event = mapRawProgress(raw);
      if (!event) return;

      if (event.status === 'merging') {
        if (merging) return;
        merging = true;
        this.emit(index, event);
        return;
      }
      if (merging) return;

      highWater = Math.min(100, Math.max(highWater, event.percent));
      this.emit(index, { ...event, percent: highWater });
    };

    return {
      accept,
      close: () => {
        closed = true;
      },
    };
  }

  private emit(index: number, event: ProgressEvent): void {
    this.post({ kind: 'progress', index, event: Object.freeze(event) });
  }

  private post(message: WorkerMessage): void {
    this.outbox.push(message);
    if (!this.flushScheduled) {
      this.flushScheduled = true;
      setImmediate(() => this.flush());
    }
  }

  private flush(): void {
    this.flushScheduled = false;
    const batch = this.outbox;
    this.outbox = [];

    for (const message of batch) {
      if (message.kind === 'progress') {
        for (const listener of [...this.progressListeners]) {
          this.invoke(() => listener(message.index, message.event));
        }
      } else {
        for (const listener of [...this.finishedListeners]) {
          this.invoke(() => listener(message.outcome));
        }
      }
    }

    if (this.outbox.length === 0) {
      const waiters = this.drainWaiters;
      this.drainWaiters = [];
      waiters.forEach((resolve) => resolve());
    }
  }

  private invoke(call: () => void): void {
    try {
      call();
    } catch (error) {
      console.error(`[WARN] Event listener failed: ${error instanceof Error ? error.message : error}`);
    }
  }

  private drained(): Promise<void> {
    if (this.outbox.length === 0 && !this.flushScheduled) {
      return Promise.resolve();
    }
    return new Promise((resolve) => this.drainWaiters.push(resolve));
  }
}

function remove<T>(list: T[], entry: T): void {
  const index = list.indexOf(entry);
  if (index !== -1) list.splice(index, 1);
}
