/**
 * Application Assembly
 *
 * Builds the express app from an explicit context, so each server (or test)
 * owns its own metrics registry, chaos state and uptime clock.
 */

import express, { type Express, type NextFunction, type Request, type Response, type RequestHandler } from 'express';
import cors from 'cors';
import { createHandlers, type Handlers } from './handlers.js';
import { instrument, wrap, type Handler, type Stage } from './instrumentation.js';
import { MetricsRegistry } from './metrics.js';
import { ChaosState } from './state.js';
import { UptimeTracker } from './uptime.js';
import type { HandlerResult, ServiceEvent } from './types.js';

export interface AppContext {
    metrics: MetricsRegistry;
    chaos: ChaosState;
    uptime: UptimeTracker;
    /** Receives request and chaos events; the live feed plugs in here. */
    publish?: (event: ServiceEvent) => void;
}

export function createContext(options: { collectDefaultMetrics?: boolean } = {}): AppContext {
    return {
        metrics: new MetricsRegistry({ collectDefaultMetrics: options.collectDefaultMetrics }),
        chaos: new ChaosState(),
        uptime: new UptimeTracker(),
    };
}

/**
 * Route request and chaos events to `publish`. Returns a function that
 * detaches both.
 */
export function publishEvents(context: AppContext, publish: (event: ServiceEvent) => void): () => void {
    context.publish = publish;
    const unsubscribe = context.chaos.onChange((state) => publish({ type: 'chaos', state }));

    return () => {
        unsubscribe();
        if (context.publish === publish) {
            context.publish = undefined;
        }
    };
}

// ============================================================================
// Transport Boundary
// ============================================================================

function send(res: Response, result: HandlerResult): void {
    if (!result.ok) {
        res.status(result.fault.status).json({ detail: result.fault.detail });
        return;
    }

    if (result.contentType) {
        // Bypass res.send so express keeps the content type byte for byte
        const body = typeof result.body === 'string' ? result.body : JSON.stringify(result.body);
        res.status(result.status).setHeader('Content-Type', result.contentType);
        res.end(body);
        return;
    }

    res.status(result.status).json(result.body);
}

/**
 * Adapt an instrumented handler to express. Thrown errors go to the error
 * middleware after the stage has recorded them.
 */
function route(stage: Stage, handler: Handler): RequestHandler {
    const dispatch = wrap(stage, handler);

    return (req: Request, res: Response, next: NextFunction) => {
        dispatch({ method: req.method, path: req.path, query: req.query })
            .then((result) => send(res, result))
            .catch(next);
    };
}

/**
 * Last-resort handler for faults no handler mapped.
 */
function errorHandler(err: unknown, _req: Request, res: Response, next: NextFunction): void {
    console.error('[Server] Unhandled error:', err instanceof Error ? err.message : err);

    if (res.headersSent) {
        next(err);
        return;
    }

    res.status(500).json({ detail: 'Internal Server Error' });
}

// ============================================================================
// App
// ============================================================================

export function createApp(context: AppContext, handlers: Handlers = createHandlers(context)): Express {
    const app = express();

    const stage = instrument({
        metrics: context.metrics,
        onRecorded: (event) => context.publish?.(event),
    });

    app.disable('x-powered-by');
    app.disable('etag');
    // Preflights continue into the router so they are counted too
    app.use(cors({ preflightContinue: true }));

    app.get('/', route(stage, handlers.info));
    app.get('/health', route(stage, handlers.health));
    app.get('/metrics', route(stage, handlers.metrics));
    app.post('/simulate-crash', route(stage, handlers.simulateCrash));
    app.options('*', route(stage, handlers.preflight));

    // Known paths, wrong method
    app.all(['/', '/health', '/metrics', '/simulate-crash'], route(stage, handlers.methodNotAllowed));

    // Everything else is still counted
    app.use(route(stage, handlers.notFound));

    app.use(errorHandler);

    return app;
}
