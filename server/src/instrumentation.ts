/**
 * Request Instrumentation
 *
 * Wraps every handler dispatch and records exactly one counter increment and
 * one latency observation per request, whatever way the handler exits:
 * a success, a returned fault, or a thrown error (counted as 500 and
 * re-thrown unchanged).
 */

import type { MetricsRegistry } from './metrics.js';
import type { HandlerResult, InboundRequest, RequestEvent } from './types.js';

export type Handler = (req: InboundRequest) => HandlerResult | Promise<HandlerResult>;

/**
 * A dispatch stage: receives the request and the next stage to run.
 */
export type Stage = (req: InboundRequest, next: Handler) => Promise<HandlerResult>;

export interface InstrumentationOptions {
    metrics: MetricsRegistry;
    /** Clock in milliseconds, monotonic by default. */
    now?: () => number;
    /** Called after the outcome is recorded. */
    onRecorded?: (event: RequestEvent) => void;
}

export function statusOf(result: HandlerResult): number {
    return result.ok ? result.status : result.fault.status;
}

export function instrument(options: InstrumentationOptions): Stage {
    const now = options.now ?? (() => performance.now());

    return async (req, next) => {
        // Raw path, not a route template: every route here is a fixed path
        const { method, path: endpoint } = req;
        const start = now();
        let status = 500;

        try {
            const result = await next(req);
            status = statusOf(result);
            return result;
        } finally {
            const durationSeconds = Math.max(0, (now() - start) / 1000);
            options.metrics.recordRequest(method, endpoint, status);
            options.metrics.observeLatency(method, endpoint, durationSeconds);
            options.onRecorded?.({ type: 'request', method, endpoint, status, durationSeconds });
        }
    };
}

/**
 * Compose a stage with a handler into a single handler.
 */
export function wrap(stage: Stage, handler: Handler): (req: InboundRequest) => Promise<HandlerResult> {
    return (req) => stage(req, handler);
}
