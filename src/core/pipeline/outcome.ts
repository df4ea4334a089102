// src/core/pipeline/outcome.ts
import type { ProcessingStatus } from '../types/index.js';

export type StageOutcome<T> =
  | { kind: 'continue'; value: T }
  | { kind: 'skip'; status: ProcessingStatus }
  | { kind: 'fail'; status: ProcessingStatus; reason: string };

export const proceed = <T>(value: T): StageOutcome<T> => ({ kind: 'continue', value });

export const skip = <T = never>(status: ProcessingStatus): StageOutcome<T> => ({ kind: 'skip', status });

export const fail = <T = never>(status: ProcessingStatus, reason: string): StageOutcome<T> => ({
  kind: 'fail',
  status,
  reason,
});

export type StatusGroup = 'posted' | 'skipped' | 'failed';

export function statusGroup(status: ProcessingStatus): StatusGroup {
  switch (status) {
    case 'summarized-posted':
      return 'posted';
    case 'duplicate-run':
    case 'duplicate-historical':
    case 'duplicate-live':
    case 'skipped-platform-excluded':
      return 'skipped';
    case 'scrape-failed':
    case 'summary-empty':
    case 'summary-failed':
    case 'post-failed-thread-create':
    case 'post-failed-chunk':
    case 'post-failed-formatting':
      return 'failed';
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown processing status: ${String(unreachable)}`);
    }
  }
}
