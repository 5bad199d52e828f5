/**
 * Chaos State
 *
 * The process-wide degraded-mode toggle. Written by the chaos-control
 * endpoint, read by the health check. Every method runs synchronously on the
 * event loop, so reads and writes of the two fields never interleave.
 */

import type { ChaosSnapshot } from './types.js';

export type ChaosListener = (state: ChaosSnapshot) => void;

export interface ChaosStateOptions {
    /** Uniform source in [0, 1). */
    random?: () => number;
}

function clamp(value: number, min: number, max: number): number {
    if (Number.isNaN(value)) return min;
    return Math.min(Math.max(value, min), max);
}

export class ChaosState {
    private enabled = false;
    private probability = 0;
    private readonly random: () => number;
    private readonly listeners = new Set<ChaosListener>();

    constructor(options: ChaosStateOptions = {}) {
        this.random = options.random ?? Math.random;
    }

    enableDegraded(probability: number): ChaosSnapshot {
        this.enabled = true;
        this.probability = clamp(probability, 0, 1);
        return this.changed();
    }

    reset(): ChaosSnapshot {
        this.enabled = false;
        this.probability = 0;
        return this.changed();
    }

    /**
     * Draws a fresh sample on every call; never memoized.
     */
    shouldFail(): boolean {
        if (!this.enabled) return false;
        return this.random() < this.probability;
    }

    snapshot(): ChaosSnapshot {
        return { enabled: this.enabled, probability: this.probability };
    }

    /**
     * Subscribe to state writes. Returns an unsubscribe function.
     */
    onChange(listener: ChaosListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    private changed(): ChaosSnapshot {
        const state = this.snapshot();
        for (const listener of this.listeners) {
            listener({ ...state });
        }
        return state;
    }
}
