// src/core/render/statistics.ts
import { isConnectionError } from './classify.js';
import type { RenderResult, RenderStatisticsSnapshot } from './types.js';

interface Counters {
  totalRequests: number;
  successfulRenders: number;
  failedRenders: number;
  timeoutErrors: number;
  connectionErrors: number;
  otherErrors: number;
  totalRenderTime: number;
}

function emptyCounters(): Counters {
  return {
    totalRequests: 0,
    successfulRenders: 0,
    failedRenders: 0,
    timeoutErrors: 0,
    connectionErrors: 0,
    otherErrors: 0,
    totalRenderTime: 0,
  };
}

/**
 * Per-coordinator render counters, updated once per completed batch.
 */
export class RenderStatistics {
  private counters: Counters = emptyCounters();

  recordBatch(results: readonly RenderResult[]): void {
    const next = { ...this.counters };

    for (const result of results) {
      next.totalRequests++;

      if (result.success) {
        next.successfulRenders++;
      } else {
        next.failedRenders++;
        if (result.errorType === 'timeout_error') {
          next.timeoutErrors++;
        } else if (isConnectionError(result.errorType)) {
          next.connectionErrors++;
        } else {
          next.otherErrors++;
        }
      }

      if (result.renderTimeSeconds !== undefined) {
        next.totalRenderTime += result.renderTimeSeconds;
      }
    }

    this.counters = next;
  }

  snapshot(): RenderStatisticsSnapshot {
    const counters = { ...this.counters };
    const total = counters.totalRequests;
    return {
      ...counters,
      successRate: total > 0 ? counters.successfulRenders / total : 0,
      averageRenderTime: total > 0 ? counters.totalRenderTime / total : 0,
    };
  }

  reset(): void {
    this.counters = emptyCounters();
  }
}
