/**
 * Resilience Pilot - Server Entry Point
 *
 * This server provides:
 * 1. Health checks for liveness/readiness probes (/health)
 * 2. Prometheus metrics following the RED method (/metrics)
 * 3. A chaos injection endpoint for testing self-healing (/simulate-crash)
 * 4. A WebSocket live feed of requests and chaos changes (/ws)
 */

import { createServer } from 'http';
import { createApp, createContext, publishEvents } from './app.js';
import { loadConfigOrExit } from './config.js';
import { LiveFeed } from './websocket.js';

const config = loadConfigOrExit();

console.log('🚀 Resilience Pilot starting up...');

const context = createContext({ collectDefaultMetrics: config.collectDefaultMetrics });
const feed = new LiveFeed(() => context.chaos.snapshot());
publishEvents(context, (event) => feed.broadcast(event));

// Create Express app
const app = createApp(context);

// Create HTTP server (needed for WebSocket)
const server = createServer(app);

// Initialize WebSocket
feed.attach(server);

// Start server
server.listen(config.port, config.host, () => {
    const base = `http://localhost:${config.port}`;
    console.log('');
    console.log('🛡️  The Resilience Pilot');
    console.log('══════════════════════════════════════════');
    console.log(`   Listening:  ${config.host}:${config.port}`);
    console.log(`   Health:     ${base}/health`);
    console.log(`   Metrics:    ${base}/metrics`);
    console.log(`   Chaos:      POST ${base}/simulate-crash?mode=immediate|degraded|reset`);
    console.log(`   WebSocket:  ws://localhost:${config.port}/ws`);
    console.log('══════════════════════════════════════════');
    console.log('');
});

let shuttingDown = false;

function shutdown(signal: NodeJS.Signals): void {
    if (shuttingDown) return;
    shuttingDown = true;

    console.log(`👋 Resilience Pilot shutting down (${signal})...`);

    feed.close()
        .then(() => new Promise<void>((resolve, reject) => {
            server.close((error) => (error ? reject(error) : resolve()));
        }))
        .then(() => process.exit(0))
        .catch((error: unknown) => {
            console.error('[Server] Shutdown failed:', error instanceof Error ? error.message : error);
            process.exit(1);
        });
}

process.on('SIGINT', shutdown);
process.on('SIGTERM', shutdown);
