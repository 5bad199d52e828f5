/**
 * Load Generator
 *
 * Polls the health endpoint on a fixed interval to populate dashboards
 * while a chaos experiment runs. Ctrl+C prints the totals.
 *
 * Usage: TARGET_URL=http://localhost:8080 INTERVAL_MS=500 npm run load
 */

import { pathToFileURL } from 'url';
import { loadLoadConfig } from './config.js';

export interface LoadStats {
    total: number;
    success: number;
    failed: number;
}

export type Fetcher = (url: string) => Promise<{ status: number }>;

/**
 * Fetch-backed probe that drains each body so the connection goes back to
 * the pool.
 */
export const httpFetcher: Fetcher = async (url) => {
    const response = await fetch(url);
    await response.arrayBuffer();
    return { status: response.status };
};

export function summarize(stats: LoadStats): string {
    return `Total: ${stats.total} | Success: ${stats.success} | Failed: ${stats.failed}`;
}

/**
 * Send one probe and fold the outcome into `stats`. Network errors count as
 * failures. Returns the progress line every 10th request.
 */
export async function probe(fetcher: Fetcher, url: string, stats: LoadStats): Promise<string | null> {
    let healthy = false;
    try {
        const response = await fetcher(url);
        healthy = response.status === 200;
    } catch (error) {
        console.error('[Load] Request failed:', error instanceof Error ? error.message : error);
    }

    stats.total += 1;
    if (healthy) {
        stats.success += 1;
    } else {
        stats.failed += 1;
    }

    if (stats.total % 10 === 0) {
        return `[${stats.total} requests] Success: ${stats.success} | Failed: ${stats.failed}`;
    }
    return null;
}

export interface LoadRun {
    stats: LoadStats;
    stop: () => void;
}

export function startLoad(fetcher: Fetcher, targetUrl: string, intervalMs: number): LoadRun {
    const stats: LoadStats = { total: 0, success: 0, failed: 0 };
    const url = `${targetUrl}/health`;
    let inFlight = false;

    const tick = async (): Promise<void> => {
        if (inFlight) return;
        inFlight = true;
        try {
            const line = await probe(fetcher, url, stats);
            if (line) console.log(line);
        } finally {
            inFlight = false;
        }
    };

    const timer = setInterval(() => {
        void tick();
    }, intervalMs);

    return { stats, stop: () => clearInterval(timer) };
}

function main(): void {
    const config = loadLoadConfig();

    console.log('🚀 Starting load generator...');
    console.log(`   Target: ${config.targetUrl}/health every ${config.intervalMs}ms`);
    console.log('Press Ctrl+C to stop');
    console.log('');

    const run = startLoad(httpFetcher, config.targetUrl, config.intervalMs);

    process.on('SIGINT', () => {
        run.stop();
        console.log('');
        console.log('📊 Statistics:');
        console.log(summarize(run.stats));
        process.exit(0);
    });
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
    main();
}
