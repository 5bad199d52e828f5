/**
 * Endpoint Handlers
 *
 * Each handler returns a HandlerResult; none of them touch the response
 * object or record request metrics. Translation to HTTP happens in app.ts.
 */

import { z } from 'zod';
import type { MetricsRegistry } from './metrics.js';
import type { ChaosState } from './state.js';
import { formatUptime, type UptimeTracker } from './uptime.js';
import { CHAOS_MODES, type ChaosMode, type HandlerResult, type HttpFault, type InboundRequest } from './types.js';
import type { Handler } from './instrumentation.js';

export const APPLICATION_NAME = 'The Resilience Pilot';
export const APPLICATION_VERSION = '1.0.0';

export const CHAOS_DEGRADED_DETAIL = 'Service degraded (chaos mode active)';
export const CHAOS_CRASH_DETAIL = '💥 Chaos injected! This is an intentional crash for testing.';

export interface HandlerDeps {
    metrics: MetricsRegistry;
    chaos: ChaosState;
    uptime: UptimeTracker;
}

export interface Handlers {
    info: Handler;
    health: Handler;
    metrics: Handler;
    simulateCrash: Handler;
    preflight: Handler;
    methodNotAllowed: Handler;
    notFound: Handler;
}

// ============================================================================
// Result Helpers
// ============================================================================

export function ok(body: unknown, status = 200, contentType?: string): HandlerResult {
    return { ok: true, status, body, contentType };
}

export function fail(status: number, detail: string): HandlerResult {
    const fault: HttpFault = { status, detail };
    return { ok: false, fault };
}

function round2(value: number): number {
    return Math.round(value * 100) / 100;
}

// ============================================================================
// Query Parsing
// ============================================================================

const DECIMAL = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?$/;

/**
 * Decimal floats only: blanks, hex and `Infinity` are rejected.
 */
const probabilitySchema = z
    .string()
    .trim()
    .regex(DECIMAL)
    .transform(Number)
    .optional()
    .transform((value) => value ?? 1.0);

/**
 * Repeated query keys resolve to their last occurrence.
 */
function lastValue(value: unknown): unknown {
    return Array.isArray(value) ? value[value.length - 1] : value;
}

function describeValue(value: unknown): string {
    return typeof value === 'string' ? value : JSON.stringify(value);
}

/**
 * Whole percentages keep one decimal place (`50.0`, `100.0`).
 */
export function formatPercent(probability: number): string {
    const percent = probability * 100;
    return Number.isInteger(percent) ? percent.toFixed(1) : String(percent);
}

function isChaosMode(value: string): value is ChaosMode {
    return CHAOS_MODES.some((mode) => mode === value);
}

// ============================================================================
// Handlers
// ============================================================================

export function createHandlers({ metrics, chaos, uptime }: HandlerDeps): Handlers {
    /**
     * GET /
     * Static description of the service.
     */
    const info: Handler = () =>
        ok({
            application: APPLICATION_NAME,
            version: APPLICATION_VERSION,
            endpoints: {
                health: '/health',
                metrics: '/metrics',
                chaos: '/simulate-crash',
            },
        });

    /**
     * GET /health
     * Liveness and readiness probe. Fails with 503 while degraded chaos
     * mode draws a failure.
     */
    const health: Handler = () => {
        const seconds = uptime.elapsed();
        metrics.setUptime(seconds);

        if (chaos.shouldFail()) {
            return fail(503, CHAOS_DEGRADED_DETAIL);
        }

        return ok({
            status: 'healthy',
            uptime: round2(seconds),
            uptime_formatted: formatUptime(seconds),
            chaos_mode: chaos.snapshot().enabled,
        });
    };

    /**
     * GET /metrics
     * Prometheus scrape target.
     */
    const metricsExport: Handler = async () => {
        metrics.setUptime(uptime.elapsed());
        return ok(await metrics.export(), 200, metrics.contentType);
    };

    /**
     * POST /simulate-crash?mode=<immediate|degraded|reset>&probability=<float>
     */
    const simulateCrash: Handler = (req: InboundRequest) => {
        // Validated up front so a bad value never reaches any mode
        const rawProbability = lastValue(req.query.probability);
        const probability = probabilitySchema.safeParse(rawProbability);
        if (!probability.success) {
            return fail(400, `Invalid probability: ${describeValue(rawProbability)}`);
        }

        const rawMode = lastValue(req.query.mode) ?? 'immediate';
        if (typeof rawMode !== 'string' || !isChaosMode(rawMode)) {
            return fail(400, `Unknown mode: ${describeValue(rawMode)}. Use 'immediate', 'degraded', or 'reset'`);
        }

        switch (rawMode) {
            case 'immediate':
                return fail(500, CHAOS_CRASH_DETAIL);

            case 'degraded': {
                const state = chaos.enableDegraded(probability.data);
                console.log(`[Chaos] Degraded mode enabled (probability=${state.probability})`);
                return ok({
                    status: 'chaos_enabled',
                    mode: 'degraded',
                    failure_probability: state.probability,
                    message: `Health endpoint will fail ${formatPercent(state.probability)}% of the time`,
                });
            }

            case 'reset':
                chaos.reset();
                console.log('[Chaos] Reset to healthy state');
                return ok({
                    status: 'chaos_disabled',
                    message: 'Service restored to healthy state',
                });
        }
    };

    /**
     * OPTIONS on any path. CORS headers are already set by the time this runs.
     */
    const preflight: Handler = () => ok(null, 204);

    const methodNotAllowed: Handler = () => fail(405, 'Method Not Allowed');

    const notFound: Handler = () => fail(404, 'Not Found');

    return { info, health, metrics: metricsExport, simulateCrash, preflight, methodNotAllowed, notFound };
}
