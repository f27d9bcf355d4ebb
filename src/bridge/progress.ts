/**
 * Progress reporter
 *
 * Converts transport byte counts to fractions and delivers them on the
 * completion context. Every delivery happens before the completion
 * callback: events arriving after close() are dropped, and deliveries still
 * queued when the completion runs are skipped.
 */

import type { TransportProgressEvent } from '../transport/types';
import type { CallbackContext } from './context';

/** Fraction in [0, 1], or null when the total size is unknown */
export type ProgressHandler = (fraction: number | null) => void;

export interface ProgressReporter {
  report(event: TransportProgressEvent): void;
  /** No further events are accepted */
  close(): void;
  /** The completion callback is running; queued deliveries are dropped */
  finish(): void;
}

export function progressFraction(event: TransportProgressEvent): number | null {
  if (event.total === undefined) {
    return null;
  }
  if (event.total <= 0) {
    return 1;
  }
  return Math.min(1, Math.max(0, event.loaded / event.total));
}

export function createProgressReporter(
  onProgress: ProgressHandler | undefined,
  context: CallbackContext
): ProgressReporter {
  let closed = false;
  let finished = false;

  return {
    report(event) {
      if (!onProgress || closed) {
        return;
      }
      const fraction = progressFraction(event);
      context.schedule(() => {
        if (!finished) {
          onProgress(fraction);
        }
      });
    },
    close() {
      closed = true;
    },
    finish() {
      closed = true;
      finished = true;
    },
  };
}
