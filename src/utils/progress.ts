/**
 * Terminal presentation of upload progress.
 */

import chalk from 'chalk';
import type { ProgressEvent, ProgressSink } from '../upload/index.js';

/** Minimal writable surface, so tests can capture output */
export interface ProgressOutput {
  isTTY?: boolean;
  write(chunk: string): boolean;
}

/**
 * Format a progress line, e.g. "Uploading: 3/10 files (30%) docs/a.txt".
 */
export function formatProgressLine(event: ProgressEvent): string {
  const pct = event.total > 0 ? Math.round((event.completed / event.total) * 100) : 0;
  return `Uploading: ${event.completed}/${event.total} files (${pct}%) ${event.activity}`;
}

/**
 * Writes a single progress line that overwrites itself.
 * Writes nothing when the output is not a TTY (e.g., in pipes).
 */
export class TerminalProgressSink implements ProgressSink {
  private readonly out: ProgressOutput;
  private lastWidth = 0;

  constructor(out: ProgressOutput = process.stdout) {
    this.out = out;
  }

  emit(event: ProgressEvent): void {
    if (!this.out.isTTY) return;

    if (event.done) {
      // Retire the progress line
      this.out.write('\r' + ' '.repeat(this.lastWidth) + '\r');
      this.lastWidth = 0;
      return;
    }

    const line = formatProgressLine(event);
    const padding = Math.max(0, this.lastWidth - line.length);
    this.out.write(`\r${chalk.dim(line)}${' '.repeat(padding)}`);
    this.lastWidth = line.length;
  }
}
