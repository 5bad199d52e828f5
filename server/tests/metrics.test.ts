import { describe, it, expect } from 'vitest';
import { LATENCY_BUCKETS, MetricsRegistry } from '../src/metrics.js';
import { bucketsFor, sampleValue } from './helpers/prometheus.js';

describe('MetricsRegistry', () => {
    it('counts requests per method, endpoint and status', async () => {
        const metrics = new MetricsRegistry();
        metrics.recordRequest('GET', '/health', 200);
        metrics.recordRequest('GET', '/health', 200);
        metrics.recordRequest('GET', '/health', 503);

        const text = await metrics.export();

        expect(sampleValue(text, 'http_requests_total', { method: 'GET', endpoint: '/health', status: '200' })).toBe(2);
        expect(sampleValue(text, 'http_requests_total', { method: 'GET', endpoint: '/health', status: '503' })).toBe(1);
        expect(text).toContain('# TYPE http_requests_total counter');
    });

    it('keeps latency observations in ascending cumulative buckets', async () => {
        const metrics = new MetricsRegistry();
        metrics.observeLatency('GET', '/', 0.003);
        metrics.observeLatency('GET', '/', 0.2);
        metrics.observeLatency('GET', '/', 7);

        const text = await metrics.export();
        const buckets = bucketsFor(text, 'http_request_duration_seconds', { method: 'GET', endpoint: '/' });

        expect(buckets.map((b) => (b.le === '+Inf' ? Infinity : Number(b.le)))).toEqual([...LATENCY_BUCKETS, Infinity]);
        expect(buckets.map((b) => b.value)).toEqual([1, 1, 1, 1, 1, 2, 2, 2, 2, 2, 3]);
        expect(sampleValue(text, 'http_request_duration_seconds_count', { method: 'GET', endpoint: '/' })).toBe(3);
        expect(sampleValue(text, 'http_request_duration_seconds_sum', { method: 'GET', endpoint: '/' })).toBeCloseTo(7.203);
    });

    it('overwrites the uptime gauge', async () => {
        const metrics = new MetricsRegistry();
        metrics.setUptime(10);
        metrics.setUptime(12.5);

        expect(sampleValue(await metrics.export(), 'app_uptime_seconds')).toBe(12.5);
    });

    it('exposes the Prometheus text content type', () => {
        expect(new MetricsRegistry().contentType).toMatch(/^text\/plain; version=0\.0\.4/);
    });

    it('keeps registries independent', async () => {
        const first = new MetricsRegistry();
        const second = new MetricsRegistry();
        first.recordRequest('GET', '/', 200);

        expect(sampleValue(await second.export(), 'http_requests_total', { method: 'GET', endpoint: '/', status: '200' }))
            .toBeUndefined();
    });

    it('adds process metrics only when asked', async () => {
        const bare = await new MetricsRegistry().export();
        const full = await new MetricsRegistry({ collectDefaultMetrics: true }).export();

        expect(bare).not.toContain('process_cpu_user_seconds_total');
        expect(full).toContain('process_cpu_user_seconds_total');
    });
});
