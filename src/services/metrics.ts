export type DispatchMethod = 'orchestrator' | 'fallback';

export interface PerformanceMetrics {
  totalQueries: number;
  successfulQueries: number;
  orchestratorQueries: number;
  fallbackQueries: number;
  errorCount: number;
  lastError: string | null;
  /** Seconds, mean over every completed query. */
  averageResponseTime: number;
  /** Percent. */
  successRate: number;
}

/**
 * Process-wide counters. Each update is a single synchronous step, so
 * concurrent requests never observe a half-applied change.
 */
export class MetricsTracker {
  private totalQueries = 0;
  private successfulQueries = 0;
  private orchestratorQueries = 0;
  private fallbackQueries = 0;
  private errorCount = 0;
  private lastError: string | null = null;
  private totalResponseTime = 0;

  recordSuccess(responseTime: number, method: DispatchMethod): void {
    this.totalQueries++;
    this.successfulQueries++;
    this.totalResponseTime += responseTime;

    if (method === 'orchestrator') {
      this.orchestratorQueries++;
    } else {
      this.fallbackQueries++;
    }
  }

  recordError(responseTime: number, errorMessage: string): void {
    this.totalQueries++;
    this.errorCount++;
    this.totalResponseTime += responseTime;
    this.lastError = errorMessage;
  }

  snapshot(): Readonly<PerformanceMetrics> {
    return Object.freeze({
      totalQueries: this.totalQueries,
      successfulQueries: this.successfulQueries,
      orchestratorQueries: this.orchestratorQueries,
      fallbackQueries: this.fallbackQueries,
      errorCount: this.errorCount,
      lastError: this.lastError,
      averageResponseTime: this.totalQueries === 0 ? 0 : this.totalResponseTime / this.totalQueries,
      successRate: this.totalQueries === 0 ? 0 : (this.successfulQueries / this.totalQueries) * 100
    });
  }

  reset(): void {
    this.totalQueries = 0;
    this.successfulQueries = 0;
    this.orchestratorQueries = 0;
    this.fallbackQueries = 0;
    this.errorCount = 0;
    this.lastError = null;
    this.totalResponseTime = 0;
  }
}
