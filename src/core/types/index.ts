export type Container = 'mkv' | 'mp4';

export interface QueueItem {
  readonly url: string;
}

export interface DownloadOptions {
  /** Height cap in pixels; null downloads the best available. */
  readonly maxResolution: number | null;
  readonly container: Container;
  readonly outputDir: string;
}

export type ProgressEvent =
  | StartingEvent
  | DownloadingEvent
  | MergingEvent
  | DoneEvent
  | ErrorEvent
  | TitleEvent;

export interface StartingEvent {
  status: 'starting';
  percent: 0;
}

export interface DownloadingEvent {
  status: 'downloading';
  percent: number;
  speed: string;
}

export interface MergingEvent {
  status: 'merging';
  percent: 100;
}

export interface DoneEvent {
  status: 'done';
  percent: 100;
}

export interface ErrorEvent {
  status: 'error';
  message: string;
}

export interface TitleEvent {
  status: 'title';
  title: string;
}

export type WorkerState = 'idle' | 'running' | 'completed' | 'stopped';

export type RunOutcome = Extract<WorkerState, 'completed' | 'stopped'>;

export interface RunState {
  readonly items: readonly QueueItem[];
  readonly options: DownloadOptions;
  stopRequested: boolean;
}

/**
 * Phase-tagged payload as reported by the extraction library's progress
 * template. Only the fields read by the mapper are typed.
 */
export interface RawProgress {
  status: string;
  downloaded_bytes?: number | null;
  total_bytes?: number | null;
  total_bytes_estimate?: number | null;
  speed?: number | null;
  filename?: string;
}
