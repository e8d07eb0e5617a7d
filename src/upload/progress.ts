/**
 * Progress reporting port.
 *
 * The engine emits through a ProgressTracker; the presentation layer
 * supplies the ProgressSink. A sink that throws is logged and otherwise
 * ignored.
 */

import type { Logger } from 'pino';
import { errorMessage } from './errors.js';

export interface ProgressEvent {
  /** What is happening, e.g. the file currently uploading */
  activity: string;
  /** Total items for the tracked operation */
  total: number;
  /** Items processed so far (succeeded or failed) */
  completed: number;
  elapsedMs: number;
  /** True on the single terminal event of the operation */
  done: boolean;
}

export interface ProgressSink {
  emit(event: ProgressEvent): void;
}

/**
 * Tracks one operation and guarantees exactly one terminal event.
 */
export class ProgressTracker {
  private readonly sink: ProgressSink | undefined;
  private readonly logger: Logger;
  private readonly startedAt = Date.now();
  private total: number;
  private completed = 0;
  private finished = false;

  constructor(sink: ProgressSink | undefined, logger: Logger, total = 0) {
    this.sink = sink;
    this.logger = logger;
    this.total = total;
  }

  get isFinished(): boolean {
    return this.finished;
  }

  setTotal(total: number): void {
    this.total = total;
  }

  /** Count one item as processed and report it */
  advance(activity: string, items = 1): void {
    this.completed += items;
    this.send(activity, false);
  }

  /** Report without counting an item */
  report(activity: string): void {
    this.send(activity, false);
  }

  /** Emit the terminal event; later calls are no-ops */
  finish(activity: string): void {
    if (this.finished) return;
    this.send(activity, true);
    this.finished = true;
  }

  private send(activity: string, done: boolean): void {
    if (this.finished || !this.sink) return;
    try {
      this.sink.emit({
        activity,
        total: this.total,
        completed: this.completed,
        elapsedMs: Date.now() - this.startedAt,
        done,
      });
    } catch (err) {
      this.logger.warn({ error: errorMessage(err) }, 'Progress sink threw');
    }
  }
}
