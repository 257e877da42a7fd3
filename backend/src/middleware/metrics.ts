/**
 * Metrics Middleware
 * Request counts, latency and ledger rejection codes for monitoring
 */

import { Request, Response, NextFunction } from 'express';

interface Metrics {
  requests: {
    total: number;
    byMethod: Record<string, number>;
    byRoute: Record<string, number>;
  };
  errors: {
    total: number;
    byRoute: Record<string, number>;
    byStatus: Record<number, number>;
    byCode: Record<string, number>;
  };
  latency: {
    total: number;
    average: number;
    byRoute: Record<string, number[]>;
  };
  timestamps: number[];
}

export interface MetricsSummary {
  requests: { total: number; rate: number };
  errors: { total: number; rate: number; byCode: Record<string, number> };
  latency: { average: number; p50: number; p95: number; p99: number };
}

const MAX_LATENCY_SAMPLES = 100;
const MAX_TIMESTAMPS = 1000;

function emptyMetrics(): Metrics {
  return {
    requests: { total: 0, byMethod: {}, byRoute: {} },
    errors: { total: 0, byRoute: {}, byStatus: {}, byCode: {} },
    latency: { total: 0, average: 0, byRoute: {} },
    timestamps: [],
  };
}

function percentile(sorted: number[], fraction: number): number {
  return sorted[Math.floor(sorted.length * fraction)] ?? 0;
}

export class MetricsCollector {
  private metrics: Metrics = emptyMetrics();

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Record a finished request
   * @param errorCode Ledger error code when the request was rejected by the ledger
   */
  recordRequest(
    method: string,
    route: string,
    duration: number,
    statusCode: number,
    errorCode?: string
  ): void {
    const { requests, errors, latency } = this.metrics;

    requests.total++;
    requests.byMethod[method] = (requests.byMethod[method] ?? 0) + 1;
    requests.byRoute[route] = (requests.byRoute[route] ?? 0) + 1;

    latency.total += duration;
    latency.average = latency.total / requests.total;
    const samples = latency.byRoute[route] ?? [];
    samples.push(duration);
    if (samples.length > MAX_LATENCY_SAMPLES) {
      samples.shift();
    }
    latency.byRoute[route] = samples;

    if (statusCode >= 400) {
      errors.total++;
      errors.byRoute[route] = (errors.byRoute[route] ?? 0) + 1;
      errors.byStatus[statusCode] = (errors.byStatus[statusCode] ?? 0) + 1;
      if (errorCode) {
        errors.byCode[errorCode] = (errors.byCode[errorCode] ?? 0) + 1;
      }
    }

    this.metrics.timestamps.push(this.now());
    if (this.metrics.timestamps.length > MAX_TIMESTAMPS) {
      this.metrics.timestamps.shift();
    }
  }

  getMetrics(): Metrics {
    return structuredClone(this.metrics);
  }

  getSummary(): MetricsSummary {
    const oneMinuteAgo = this.now() - 60 * 1000;
    const recentRequests = this.metrics.timestamps.filter((ts) => ts > oneMinuteAgo).length;
    const { requests, errors, latency } = this.metrics;

    const errorRate = requests.total > 0 ? (errors.total / requests.total) * 100 : 0;
    const allLatencies = Object.values(latency.byRoute)
      .flat()
      .sort((a, b) => a - b);

    return {
      requests: { total: requests.total, rate: recentRequests },
      errors: { total: errors.total, rate: errorRate, byCode: { ...errors.byCode } },
      latency: {
        average: latency.average,
        p50: percentile(allLatencies, 0.5),
        p95: percentile(allLatencies, 0.95),
        p99: percentile(allLatencies, 0.99),
      },
    };
  }

  reset(): void {
    this.metrics = emptyMetrics();
  }
}

export const metricsCollector = new MetricsCollector();

/**
 * Request path with numeric ids collapsed, so /api/capsules/7 and /api/capsules/8 share a bucket
 */
export function routeKey(originalUrl: string): string {
  const [path] = originalUrl.split('?');
  return path.replace(/\/\d+(?=\/|$)/g, '/:id');
}

/**
 * Express middleware to collect metrics
 */
export function metricsMiddleware(collector: MetricsCollector = metricsCollector) {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();

    res.on('finish', () => {
      const code: unknown = res.locals.errorCode;
      collector.recordRequest(
        req.method,
        routeKey(req.originalUrl),
        Date.now() - startTime,
        res.statusCode,
        typeof code === 'string' ? code : undefined
      );
    });

    next();
  };
}

/**
 * Metrics endpoint handler; ?summary=true returns the condensed view
 */
export function getMetricsHandler(collector: MetricsCollector = metricsCollector) {
  return (req: Request, res: Response): void => {
    if (req.query.summary === 'true') {
      res.json(collector.getSummary());
    } else {
      res.json(collector.getMetrics());
    }
  };
}
