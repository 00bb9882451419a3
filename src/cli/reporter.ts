// src/cli/reporter.ts
import type { ProgressEvent, RunOutcome } from '../core/types/index.js';

export interface QueueRow {
  url: string;
  title: string;
  addedAt: string;
  progress: number;
  speed: string;
  status: string;
}

export interface Reporter {
  apply(index: number, event: ProgressEvent): void;
  finish(outcome: RunOutcome): void;
}

type Writer = (line: string) => void;

const pad2 = (value: number) => String(value).padStart(2, '0');

/** `MM/DD/YYYY hh:mm:ss AM`, local time. */
export function formatAddedAt(date: Date): string {
  const hours = date.getHours();
  const hour12 = hours % 12 === 0 ? 12 : hours % 12;
  return (
    `${pad2(date.getMonth() + 1)}/${pad2(date.getDate())}/${date.getFullYear()} ` +
    `${pad2(hour12)}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())} ${hours < 12 ? 'AM' : 'PM'}`
  );
}

export function createRows(urls: readonly string[], addedAt: Date = new Date()): QueueRow[] {
  const stamp = formatAddedAt(addedAt);
  return urls.map((url) => ({
    url,
    title: '',
    addedAt: stamp,
    progress: 0,
    speed: '',
    status: 'Queued',
  }));
}

/**
 * Line-oriented queue view. Keeps one row per item, last value wins per
 * field, and prints a line whenever a row changes in a way worth showing.
 */
export class TableReporter implements Reporter {
  private readonly rows: QueueRow[];
  private readonly lastPrinted = new Map<number, number>();

  constructor(
    rows: QueueRow[],
    private readonly write: Writer = (line) => console.log(line),
    private readonly progressStep: number = 10
  ) {
    this.rows = rows;
  }

  getRows(): readonly QueueRow[] {
    return this.rows;
  }

  apply(index: number, event: ProgressEvent): void {
    const row = this.rows[index];
    if (!row) return;
    const label = `[${index + 1}/${this.rows.length}]`;

    switch (event.status) {
      case 'starting':
        row.progress = event.percent;
        row.status = 'Starting';
        this.lastPrinted.delete(index);
        this.write(`${label} Starting ${row.url}`);
        break;
      case 'title':
        row.title = event.title;
        this.write(`${label} ${event.title}`);
        break;
      case 'downloading': {
        row.progress = event.percent;
        row.speed = event.speed;
        row.status = 'Downloading';
        const previous = this.lastPrinted.get(index);
        if (previous === undefined || event.percent >= previous + this.progressStep) {
          this.lastPrinted.set(index, event.percent);
          this.write(`${label} Downloading ${event.percent}%${event.speed ? ` (${event.speed})` : ''}`);
        }
        break;
      }
      case 'merging':
        row.progress = event.percent;
        row.status = 'Merging';
        this.write(`${label} Merging`);
        break;
      case 'done':
        row.progress = event.percent;
        row.status = 'Done';
        this.write(`✓ ${row.url}`);
        break;
      case 'error':
        row.status = event.message;
        this.write(`✗ ${row.url} (${event.message})`);
        break;
    }
  }

  finish(outcome: RunOutcome): void {
    const done = this.rows.filter((row) => row.status === 'Done').length;
    const untouched = this.rows.filter((row) => row.status === 'Queued').length;
    const failed = this.rows.length - done - untouched;

    this.write('\n' + '━'.repeat(50));
    for (const line of renderTable(this.rows)) {
      this.write(line);
    }
    this.write('');
    this.write(
      `Summary: ${done} done, ${failed} failed, ${untouched} not started` +
        (outcome === 'stopped' ? ' (stopped)' : '')
    );
  }
}

/** Writes every event as one JSON object per line. */
export class JsonlReporter implements Reporter {
  constructor(
    private readonly urls: readonly string[],
    private readonly write: Writer = (line) => console.log(line)
  ) {}

  apply(index: number, event: ProgressEvent): void {
    this.write(JSON.stringify({ index, url: this.urls[index], ...event }));
  }

  finish(outcome: RunOutcome): void {
    this.write(JSON.stringify({ finished: outcome }));
  }
}

const COLUMNS: Array<{ header: string; value: (row: QueueRow) => string; max: number }> = [
  { header: 'URL', value: (row) => row.url, max: 48 },
  { header: 'Title', value: (row) => row.title, max: 40 },
  { header: 'Date Added', value: (row) => row.addedAt, max: 22 },
  { header: 'Progress', value: (row) => `${row.progress}%`, max: 8 },
  { header: 'Status', value: (row) => row.status, max: 60 },
];

function truncate(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - 1) + '…' : text;
}

export function renderTable(rows: readonly QueueRow[]): string[] {
  const cells = rows.map((row) => COLUMNS.map((column) => truncate(column.value(row), column.max)));
  const widths = COLUMNS.map((column, i) =>
    Math.max(column.header.length, ...cells.map((line) => line[i].length))
  );
  const format = (line: string[]) =>
    line.map((cell, i) => cell.padEnd(widths[i])).join('  ').trimEnd();

  return [
    format(COLUMNS.map((column) => column.header)),
    format(widths.map((width) => '-'.repeat(width))),
    ...cells.map(format),
  ];
}
