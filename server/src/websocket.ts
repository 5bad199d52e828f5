/**
 * WebSocket Live Feed
 *
 * Streams request outcomes and chaos-state changes to connected clients,
 * so a dashboard can watch a chaos experiment as it runs.
 * Uses the ws library for WebSocket support.
 */

import { WebSocketServer, WebSocket } from 'ws';
import type { Server } from 'http';
import type { ChaosSnapshot, ServiceEvent } from './types.js';

export class LiveFeed {
    private wss: WebSocketServer | null = null;

    /**
     * @param currentChaos - Snapshot sent to each client on connect.
     */
    constructor(private readonly currentChaos: () => ChaosSnapshot) {}

    /**
     * Attach to an existing HTTP server on `/ws`.
     */
    attach(server: Server): void {
        this.wss = new WebSocketServer({ server, path: '/ws' });

        this.wss.on('connection', (ws: WebSocket) => {
            console.log('[WebSocket] Client connected');

            ws.send(JSON.stringify({ type: 'connected', chaos: this.currentChaos() }));

            ws.on('close', () => {
                console.log('[WebSocket] Client disconnected');
            });

            ws.on('error', (error: Error) => {
                console.error('[WebSocket] Error:', error.message);
            });
        });

        console.log('[WebSocket] Server initialized on /ws');
    }

    /**
     * Send an event to every open client. A no-op until attached.
     */
    broadcast(event: ServiceEvent): void {
        if (!this.wss) return;

        const message = JSON.stringify(event);

        this.wss.clients.forEach((client) => {
            if (client.readyState === WebSocket.OPEN) {
                client.send(message);
            }
        });
    }

    close(): Promise<void> {
        const wss = this.wss;
        if (!wss) return Promise.resolve();
        this.wss = null;

        for (const client of wss.clients) {
            client.terminate();
        }

        return new Promise((resolve, reject) => {
            wss.close((error) => (error ? reject(error) : resolve()));
        });
    }
}
