/**
 * Metrics Registry
 *
 * RED-method instrumentation (Rate, Errors, Duration) on a prom-client
 * registry owned by one application instance:
 * - http_requests_total: request count by method, endpoint, status
 * - http_request_duration_seconds: latency histogram by method, endpoint
 * - app_uptime_seconds: process uptime
 */

import { Counter, Gauge, Histogram, Registry, collectDefaultMetrics } from 'prom-client';

export const LATENCY_BUCKETS = [0.005, 0.01, 0.025, 0.05, 0.1, 0.25, 0.5, 1.0, 2.5, 5.0];

export interface MetricsRegistryOptions {
    /** Also register prom-client's process and runtime collectors. */
    collectDefaultMetrics?: boolean;
}

export class MetricsRegistry {
    private readonly registry = new Registry();

    private readonly requestCount = new Counter({
        name: 'http_requests_total',
        help: 'Total HTTP requests',
        labelNames: ['method', 'endpoint', 'status'] as const,
        registers: [this.registry],
    });

    private readonly requestLatency = new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request latency in seconds',
        labelNames: ['method', 'endpoint'] as const,
        buckets: LATENCY_BUCKETS,
        registers: [this.registry],
    });

    private readonly uptime = new Gauge({
        name: 'app_uptime_seconds',
        help: 'Application uptime in seconds',
        registers: [this.registry],
    });

    constructor(options: MetricsRegistryOptions = {}) {
        if (options.collectDefaultMetrics) {
            collectDefaultMetrics({ register: this.registry });
        }
    }

    recordRequest(method: string, endpoint: string, statusCode: number): void {
        this.requestCount.inc({ method, endpoint, status: String(statusCode) });
    }

    observeLatency(method: string, endpoint: string, durationSeconds: number): void {
        this.requestLatency.observe({ method, endpoint }, durationSeconds);
    }

    setUptime(seconds: number): void {
        this.uptime.set(seconds);
    }

    /**
     * Prometheus text exposition of every registered metric.
     */
    export(): Promise<string> {
        return this.registry.metrics();
    }

    get contentType(): string {
        return this.registry.contentType;
    }
}
