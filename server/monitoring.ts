/**
 * API Monitoring & Metrics
 *
 * Tracks success rates, failures, and latency for each external
 * integration. Logs a warning when thresholds are exceeded.
 */

import { AppError } from './error-handling';

export const MONITORED_APIS = ['roboflow', 'blynk', 'database'] as const;
export type ApiName = typeof MONITORED_APIS[number];

interface ApiMetrics {
  success: number;
  failed: number;
  consecutiveFailures: number;
  totalLatencyMs: number;
  minLatencyMs: number;
  maxLatencyMs: number;
  lastError?: {
    message: string;
    timestamp: number;
    code?: string;
  };
  lastSuccessTimestamp: number;
  lastFailureTimestamp: number;
}

export interface ApiMetricsSnapshot extends ApiMetrics {
  totalRequests: number;
  successRate: string;
  failureRate: string;
  avgLatencyMs: number;
  isHealthy: boolean;
}

export type ApiHealth = 'healthy' | 'degraded' | 'down';

function emptyMetrics(): ApiMetrics {
  return {
    success: 0,
    failed: 0,
    consecutiveFailures: 0,
    totalLatencyMs: 0,
    minLatencyMs: Infinity,
    maxLatencyMs: 0,
    lastSuccessTimestamp: Date.now(),
    lastFailureTimestamp: 0,
  };
}

export class MonitoringService {
  private metrics = new Map<ApiName, ApiMetrics>();
  private thresholds = {
    failureRatePercent: 10, // Warn if >10% of requests fail
    maxConsecutiveFailures: 5,
    slowLatencyMs: 5000,
  };

  constructor() {
    this.reset();
  }

  private metric(api: ApiName): ApiMetrics {
    let metric = this.metrics.get(api);
    if (!metric) {
      metric = emptyMetrics();
      this.metrics.set(api, metric);
    }
    return metric;
  }

  recordSuccess(api: ApiName, latencyMs: number): void {
    const metric = this.metric(api);
    metric.success++;
    metric.consecutiveFailures = 0;
    metric.totalLatencyMs += latencyMs;
    metric.minLatencyMs = Math.min(metric.minLatencyMs, latencyMs);
    metric.maxLatencyMs = Math.max(metric.maxLatencyMs, latencyMs);
    metric.lastSuccessTimestamp = Date.now();
    metric.lastError = undefined;

    this.checkAlerts(api);
  }

  recordFailure(api: ApiName, error: Error | string, code?: string): void {
    const metric = this.metric(api);
    metric.failed++;
    metric.consecutiveFailures++;
    metric.lastFailureTimestamp = Date.now();
    metric.lastError = {
      message: error instanceof Error ? error.message : String(error),
      timestamp: Date.now(),
      code,
    };

    this.checkAlerts(api);
  }

  getMetrics(api: ApiName): ApiMetricsSnapshot {
    const metric = this.metric(api);
    const total = metric.success + metric.failed;
    const failureRate = total > 0 ? (metric.failed / total) * 100 : 0;
    const avgLatencyMs = metric.success > 0 ? metric.totalLatencyMs / metric.success : 0;

    return {
      ...metric,
      totalRequests: total,
      successRate: total > 0 ? ((metric.success / total) * 100).toFixed(1) : '100',
      failureRate: failureRate.toFixed(1),
      avgLatencyMs: Math.round(avgLatencyMs),
      isHealthy: failureRate < this.thresholds.failureRatePercent,
    };
  }

  getAllMetrics(): Record<ApiName, ApiMetricsSnapshot> {
    return {
      roboflow: this.getMetrics('roboflow'),
      blynk: this.getMetrics('blynk'),
      database: this.getMetrics('database'),
    };
  }

  getHealthStatus(): Record<ApiName, { status: ApiHealth; failureRate: string; totalRequests: number }> {
    const health = (api: ApiName) => {
      const metrics = this.getMetrics(api);
      const failureRate = parseFloat(metrics.failureRate);

      let status: ApiHealth = 'healthy';
      if (metrics.consecutiveFailures >= this.thresholds.maxConsecutiveFailures) {
        status = 'down';
      } else if (failureRate > this.thresholds.failureRatePercent) {
        status = 'degraded';
      }

      return {
        status,
        failureRate: failureRate.toFixed(1) + '%',
        totalRequests: metrics.totalRequests,
      };
    };

    return {
      roboflow: health('roboflow'),
      blynk: health('blynk'),
      database: health('database'),
    };
  }

  private checkAlerts(api: ApiName): void {
    const metrics = this.getMetrics(api);

    if (parseFloat(metrics.failureRate) > this.thresholds.failureRatePercent && metrics.totalRequests >= 10) {
      console.warn(
        `[Monitoring] ${api.toUpperCase()} HIGH FAILURE RATE: ${metrics.failureRate}% of requests are failing (threshold: ${this.thresholds.failureRatePercent}%)`
      );
    }

    if (metrics.consecutiveFailures === this.thresholds.maxConsecutiveFailures) {
      console.error(
        `[Monitoring] ${api.toUpperCase()} UNAVAILABLE: ${metrics.consecutiveFailures} consecutive failures`
      );
    }

    if (metrics.avgLatencyMs > this.thresholds.slowLatencyMs) {
      console.warn(`[Monitoring] ${api.toUpperCase()} SLOW: average latency is ${metrics.avgLatencyMs}ms`);
    }
  }

  reset(api?: ApiName): void {
    if (api) {
      this.metrics.set(api, emptyMetrics());
      return;
    }
    for (const name of MONITORED_APIS) {
      this.metrics.set(name, emptyMetrics());
    }
  }
}

export const monitoring = new MonitoringService();

/**
 * Wrapper to track API latency
 */
export async function trackApiCall<T>(
  api: ApiName,
  fn: () => Promise<T>,
  service: MonitoringService = monitoring
): Promise<T> {
  const startTime = Date.now();
  try {
    const result = await fn();
    service.recordSuccess(api, Date.now() - startTime);
    return result;
  } catch (error) {
    const code = error instanceof AppError ? error.code : 'unknown';
    service.recordFailure(api, error instanceof Error ? error : String(error), code);
    throw error;
  }
}
