/**
 * Resilience Pilot Type Definitions
 *
 * Shared shapes for chaos state, handler results and live-feed events.
 */

// ============================================================================
// Chaos Types
// ============================================================================

/**
 * Modes accepted by the chaos-control endpoint.
 * - immediate: fail this request with a 500
 * - degraded: make /health fail with a given probability
 * - reset: turn chaos off
 */
export type ChaosMode = 'immediate' | 'degraded' | 'reset';

export const CHAOS_MODES: readonly ChaosMode[] = ['immediate', 'degraded', 'reset'];

export interface ChaosSnapshot {
    enabled: boolean;
    probability: number;       // Always within [0, 1]
}

// ============================================================================
// Handler Results
// ============================================================================

/**
 * A failure a handler reports on purpose. Rendered as `{"detail": ...}`.
 */
export interface HttpFault {
    status: number;
    detail: string;
}

export interface HandlerSuccess {
    ok: true;
    status: number;
    body: unknown;
    contentType?: string;      // Defaults to JSON when omitted
}

export interface HandlerFailure {
    ok: false;
    fault: HttpFault;
}

export type HandlerResult = HandlerSuccess | HandlerFailure;

/**
 * The parts of an inbound request handlers and the instrumentation need.
 */
export interface InboundRequest {
    method: string;
    path: string;
    query: Record<string, unknown>;
}

// ============================================================================
// Live Feed Events
// ============================================================================

export interface RequestEvent {
    type: 'request';
    method: string;
    endpoint: string;
    status: number;
    durationSeconds: number;
}

export interface ChaosEvent {
    type: 'chaos';
    state: ChaosSnapshot;
}

export type ServiceEvent = RequestEvent | ChaosEvent;
